// Core types and enums for the tenant log pipeline
export * from './enums.js';
export * from './logs.js';
export * from './api.js';
