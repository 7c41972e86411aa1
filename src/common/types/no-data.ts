/**
 * A fetch failure is a data gap for the user: it resolves to an empty value
 * and leaves a warning in the logs.
 */

import type { FetchError } from './errors.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export const valueOrEmpty = <T>(
  result: Result<T, FetchError>,
  empty: T,
  logger: Logger,
  context: Readonly<Record<string, unknown>>
): T =>
  result.match(
    (value) => value,
    (error) => {
      logger.warn({ ...context, errorType: error.type, err: error }, error.message);
      return empty;
    }
  );
