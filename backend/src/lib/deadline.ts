export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

export class OperationCancelledError extends Error {
  constructor() {
    super('Operation cancelled by caller');
    this.name = 'OperationCancelledError';
  }
}

/**
 * Run an abortable operation with a hard timeout.
 *
 * The operation receives a signal that fires on timeout or when `parent`
 * aborts. The returned promise settles at that moment even if the operation
 * ignores the signal, so no caller waits past its deadline.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new OperationCancelledError();
  }

  const controller = new AbortController();
  let onParentAbort: (() => void) | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new DeadlineExceededError(timeoutMs));
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort();
        reject(new OperationCancelledError());
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
