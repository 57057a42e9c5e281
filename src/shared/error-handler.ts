/**
 * Centralized error handling utilities
 * Error taxonomy shared by the builder, the validator, the CSRF helper and the CLI
 */

import type { Logger } from './logger.js';

// ══════════════════════════════════════════════════════════════════════════════
// ERROR TYPES
// ══════════════════════════════════════════════════════════════════════════════

export class FormsmithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'FormsmithError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Structural validation failure: the value handed to the validator is not
 * something it can validate. Rule failures are reported as data, never thrown.
 */
export class ValidationError extends FormsmithError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, 'VALIDATION_ERROR', details, suggestion);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends FormsmithError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, 'CONFIGURATION_ERROR', details, suggestion);
    this.name = 'ConfigurationError';
  }
}

/** A form document given to the CLI could not be read or parsed. */
export class DocumentError extends FormsmithError {
  constructor(message: string, details?: Record<string, unknown>, suggestion?: string) {
    super(message, 'DOCUMENT_ERROR', details, suggestion);
    this.name = 'DocumentError';
  }
}

// ══════════════════════════════════════════════════════════════════════════════
// ERROR UTILITIES
// ══════════════════════════════════════════════════════════════════════════════

/**
 * Safe error message extraction
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof FormsmithError && error.code === code;
}

/**
 * Format error for user display
 */
export function formatErrorMessage(
  error: unknown,
  options?: {
    includeStack?: boolean;
    context?: string;
  }
): string {
  const parts: string[] = [];

  if (options?.context) {
    parts.push(`${options.context}:`);
  }

  parts.push(getErrorMessage(error));

  if (error instanceof FormsmithError && error.suggestion) {
    parts.push(`\nSuggestion: ${error.suggestion}`);
  }

  if (options?.includeStack && error instanceof Error && error.stack) {
    parts.push(`\nStack trace:\n${error.stack}`);
  }

  return parts.join(' ');
}

export function isNodeError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && (code === undefined || error.code === code);
}

/** Constructor shared by the FormsmithError subclasses. */
export type FormsmithErrorClass = new (
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
) => FormsmithError;

/**
 * Convert unknown error to FormsmithError, or to `as` when given
 */
export function wrapError(
  error: unknown,
  context?: string,
  suggestion?: string,
  as?: FormsmithErrorClass
): FormsmithError {
  if (error instanceof FormsmithError) {
    return error;
  }

  const message = context ? `${context}: ${getErrorMessage(error)}` : getErrorMessage(error);
  const details = isNodeError(error) ? { code: error.code, path: error.path } : undefined;

  if (as) {
    return new as(message, details, suggestion);
  }
  return new FormsmithError(message, 'UNKNOWN_ERROR', details, suggestion);
}

// ══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER
// ══════════════════════════════════════════════════════════════════════════════

export interface ErrorHandlerOptions {
  logger?: Logger;
  exitOnError?: boolean;
  showStack?: boolean;
}

/**
 * Centralized error handler
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): void {
  const { logger, exitOnError = false, showStack = process.env.DEBUG === 'true' } = options;

  const message = formatErrorMessage(error, { includeStack: showStack });

  if (logger) {
    logger.error(message);
  } else {
    console.error(`❌ ${message}`);
  }

  if (error instanceof FormsmithError && error.details) {
    if (logger) {
      logger.debug('Error details', error.details);
    } else if (showStack) {
      console.error('Error details:', error.details);
    }
  }

  if (exitOnError) {
    process.exit(1);
  }
}

/**
 * Async error wrapper for cleaner try-catch
 */
export async function tryAsync<T>(
  fn: () => Promise<T>,
  context?: string,
  suggestion?: string,
  as?: FormsmithErrorClass
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw wrapError(error, context, suggestion, as);
  }
}

/**
 * Sync error wrapper for cleaner try-catch
 */
export function trySync<T>(fn: () => T, context?: string, suggestion?: string, as?: FormsmithErrorClass): T {
  try {
    return fn();
  } catch (error) {
    throw wrapError(error, context, suggestion, as);
  }
}
