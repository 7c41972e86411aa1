import type { ValueError } from '@sinclair/typebox/errors';

/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * A required column is absent from a table handed over by a collaborator.
 * Signals a contract violation, not a data gap: never swallowed.
 */
export interface MalformedInputError extends AppError {
  readonly type: 'MalformedInputError';
  readonly column: string;
  /** Operation or table the column was expected in */
  readonly context: string;
}

/**
 * A caller demanded a non-empty result and none exists.
 */
export interface EmptyResultError extends AppError {
  readonly type: 'EmptyResultError';
  readonly context: string;
}

/**
 * Infrastructure errors raised while talking to the open-data APIs
 */
export interface InfraError extends AppError {
  readonly type: 'NetworkError' | 'TimeoutError';
  readonly retryable: boolean;
}

export interface HttpError extends AppError {
  readonly type: 'HttpError';
  readonly status: number;
  readonly url: string;
}

export interface ResponseValidationError extends AppError {
  readonly type: 'ResponseValidationError';
  readonly details: string[];
}

/**
 * Everything a fetch collaborator may fail with.
 * Use cases treat any of these as "no data".
 */
export type FetchError = InfraError | HttpError | ResponseValidationError;

export const createMalformedInputError = (
  column: string,
  context: string
): MalformedInputError => ({
  type: 'MalformedInputError',
  message: `Column '${column}' is missing from ${context}`,
  column,
  context,
});

export const createEmptyResultError = (context: string): EmptyResultError => ({
  type: 'EmptyResultError',
  message: `No rows available for ${context}`,
  context,
});

export const createNetworkError = (message: string, cause?: unknown): InfraError => ({
  type: 'NetworkError',
  message,
  retryable: true,
  cause,
});

export const createTimeoutError = (message: string, cause?: unknown): InfraError => ({
  type: 'TimeoutError',
  message,
  retryable: true,
  cause,
});

export const createHttpError = (status: number, url: string): HttpError => ({
  type: 'HttpError',
  message: `Request to ${url} failed with status ${String(status)}`,
  status,
  url,
});

export const createResponseValidationError = (
  message: string,
  details: string[]
): ResponseValidationError => ({
  type: 'ResponseValidationError',
  message,
  details,
});

/**
 * Renders TypeBox validation errors as `path: message` lines.
 */
export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
