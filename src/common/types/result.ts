/**
 * Result pattern utilities.
 * Core transformations return neverthrow Results instead of throwing.
 */

export { ok, err, Ok, Err, ResultAsync, okAsync, errAsync } from 'neverthrow';
export type { Result } from 'neverthrow';
