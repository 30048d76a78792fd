import { config } from '../config.js';

export interface RedactionMatcher {
  name: string;
  // Must carry the global flag; written greedy so the leftmost match is also the longest
  pattern: RegExp;
  // Fixed replacement, never matchable by any matcher
  mask: string;
  // Extra check on a candidate match; rejected candidates stay in the text
  validate?: (match: string) => boolean;
}

export interface RedactionResult {
  modifiedText: string;
  wasModified: boolean;
}

export type Redactor = (text: string) => RedactionResult;

// Luhn checksum, keeps long numeric ids and epoch millis out of the card matcher
export function passesLuhn(candidate: string): boolean {
  const digits = candidate.replace(/\D/g, '');
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 1) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return sum % 10 === 0;
}

// Built-in matchers, highest priority first
export const DEFAULT_MATCHERS: readonly RedactionMatcher[] = [
  {
    name: 'email',
    pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
    mask: '[REDACTED_EMAIL]',
  },
  {
    name: 'ssn',
    pattern: /(?<!\d)\d{3}-\d{2}-\d{4}(?!\d)/g,
    mask: '[REDACTED_SSN]',
  },
  {
    name: 'credit_card',
    pattern: /(?<!\d)\d(?:[ -]?\d){12,18}(?!\d)/g,
    mask: '[REDACTED_CARD]',
    validate: passesLuhn,
  },
  {
    name: 'phone',
    pattern: /(?<![\d+])(?:\+?1[-. ]?)?(?:\(\d{3}\) ?|\d{3}[-. ]?)\d{3}[-. ]?\d{4}(?!\d)/g,
    mask: '[REDACTED_PHONE]',
  },
];

interface Segment {
  text: string;
  masked: boolean;
}

// Characters kept on each side of a candidate when checking it in isolation
const LOOKAROUND_CONTEXT = 32;

function stickyFlags(pattern: RegExp): string {
  return `${pattern.flags.replace(/[gy]/g, '')}y`;
}

// Whether the pattern matches exactly text[start, end), its lookarounds seeing the real neighbours
function matchesExactly(pattern: RegExp, text: string, start: number, end: number): boolean {
  const from = Math.max(0, start - LOOKAROUND_CONTEXT);
  const window = text.slice(from, end + LOOKAROUND_CONTEXT);
  const offset = end - from;
  const exact = new RegExp(
    `(?:${pattern.source})(?<![\\s\\S]{${offset + 1}})(?<=[\\s\\S]{${offset}})`,
    stickyFlags(pattern)
  );
  exact.lastIndex = start - from;
  return exact.test(window);
}

// Longest candidate starting at `start` that the matcher's check accepts
function longestValidAt(matcher: RedactionMatcher, text: string, start: number): number | undefined {
  const sticky = new RegExp(matcher.pattern.source, stickyFlags(matcher.pattern));
  sticky.lastIndex = start;
  const longest = sticky.exec(text);
  if (!longest || longest[0].length === 0) {
    return undefined;
  }

  const longestEnd = start + longest[0].length;
  for (let end = longestEnd; end > start; end--) {
    if (end !== longestEnd && !matchesExactly(matcher.pattern, text, start, end)) {
      continue;
    }
    if (matcher.validate?.(text.slice(start, end)) ?? true) {
      return end;
    }
  }
  return undefined;
}

/**
 * Search a rejected candidate's span for an accepted one.
 *
 * Starts are tried left to right and, at each start, lengths from longest
 * down, so a valid card number behind a few stray digits is still found.
 */
function findValidIn(
  matcher: RedactionMatcher,
  text: string,
  spanStart: number,
  spanEnd: number
): { start: number; end: number } | undefined {
  for (let start = spanStart; start < spanEnd; start++) {
    const end = longestValidAt(matcher, text, start);
    if (end !== undefined) {
      return { start, end };
    }
  }
  return undefined;
}

// Split one unmasked segment around every match of a matcher
function applyMatcher(segment: Segment, matcher: RedactionMatcher): Segment[] {
  const pattern = new RegExp(matcher.pattern.source, matcher.pattern.flags);
  const result: Segment[] = [];
  let cursor = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(segment.text)) !== null) {
    if (match[0].length === 0) {
      pattern.lastIndex += 1;
      continue;
    }

    let start = match.index;
    let end = match.index + match[0].length;
    if (matcher.validate && !matcher.validate(match[0])) {
      const found = findValidIn(matcher, segment.text, start, end);
      if (!found) {
        // Every start inside the span has been tried
        pattern.lastIndex = end;
        continue;
      }
      ({ start, end } = found);
      pattern.lastIndex = end;
    }

    if (start > cursor) {
      result.push({ text: segment.text.slice(cursor, start), masked: false });
    }
    result.push({ text: matcher.mask, masked: true });
    cursor = end;
  }

  if (cursor === 0) {
    return [segment];
  }
  if (cursor < segment.text.length) {
    result.push({ text: segment.text.slice(cursor), masked: false });
  }
  return result;
}

/**
 * Build a redactor over an ordered matcher list.
 *
 * Each matcher only sees text no earlier matcher has masked, and a match
 * never spans a mask, so overlaps resolve in favour of the earlier matcher.
 */
export function createRedactor(matchers: readonly RedactionMatcher[] = DEFAULT_MATCHERS): Redactor {
  for (const matcher of matchers) {
    if (!matcher.pattern.global) {
      throw new Error(`Redaction matcher ${matcher.name} must use the global flag`);
    }
  }

  return (text) => {
    let segments: Segment[] = [{ text, masked: false }];
    let wasModified = false;

    for (const matcher of matchers) {
      segments = segments.flatMap((segment) => {
        if (segment.masked) return [segment];
        const split = applyMatcher(segment, matcher);
        if (split.some((part) => part.masked)) wasModified = true;
        return split;
      });
    }

    return {
      modifiedText: wasModified ? segments.map((segment) => segment.text).join('') : text,
      wasModified,
    };
  };
}

// Pick built-in matchers by name; the order given is the priority order
export function resolveMatchers(names: readonly string[]): RedactionMatcher[] {
  if (names.length === 0) {
    return [...DEFAULT_MATCHERS];
  }
  return names.map((name) => {
    const matcher = DEFAULT_MATCHERS.find((candidate) => candidate.name === name);
    if (!matcher) {
      const known = DEFAULT_MATCHERS.map((candidate) => candidate.name).join(', ');
      throw new Error(`Unknown redaction matcher: ${name}. Known: ${known}`);
    }
    return matcher;
  });
}

let configuredRedactor: Redactor | undefined;

// Redactor over the matchers named in REDACTION_MATCHERS
export function getConfiguredRedactor(): Redactor {
  if (!configuredRedactor) {
    configuredRedactor = createRedactor(resolveMatchers(config.redaction.matchers));
  }
  return configuredRedactor;
}

export const redact: Redactor = (text) => getConfiguredRedactor()(text);
