/**
 * JSON-over-HTTP helper shared by the open-data clients.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  createHttpError,
  createNetworkError,
  createResponseValidationError,
  createTimeoutError,
  formatSchemaErrors,
  type FetchError,
} from '@/common/types/errors.js';

import type { TSchema, Static } from '@sinclair/typebox';
import type { Logger } from 'pino';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  timeoutMs: number;
  logger: Logger;
  /** Defaults to the global fetch */
  fetchFn?: FetchFn;
}

const isAbortTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * Builds a typed GET function for a response schema.
 */
export const makeJsonGetter = <S extends TSchema>(schema: S, options: HttpOptions) => {
  const validator = TypeCompiler.Compile(schema);
  const fetchFn: FetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  const { logger, timeoutMs } = options;

  return async (url: string): Promise<Result<Static<S>, FetchError>> => {
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (isAbortTimeout(error)) {
        logger.warn({ url, timeoutMs }, 'Open-data request timed out');
        return err(createTimeoutError(`Request to ${url} timed out after ${String(timeoutMs)}ms`, error));
      }
      logger.warn({ url, err: error }, 'Open-data request failed');
      return err(
        createNetworkError(
          `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
          error
        )
      );
    }

    if (!response.ok) {
      logger.warn({ url, status: response.status }, 'Open-data request returned an error status');
      return err(createHttpError(response.status, url));
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return err(
        createResponseValidationError(`Response from ${url} is not valid JSON`, [
          error instanceof Error ? error.message : String(error),
        ])
      );
    }

    if (!validator.Check(payload)) {
      const details = formatSchemaErrors(validator.Errors(payload));
      logger.warn({ url, details }, 'Open-data response failed schema validation');
      return err(createResponseValidationError(`Unexpected response shape from ${url}`, details));
    }

    return ok(payload);
  };
};
