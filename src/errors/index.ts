/**
 * Error Handling Module
 *
 * Structured error types and centralized error handling.
 */

export * from './types';
export * from './handler';
