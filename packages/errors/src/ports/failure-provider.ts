import type { CodedError } from "./failure"

/**
 * Exposes the failure recorded by some execution context, if any.
 *
 * `undefined` means no failure occurred. It is never represented by a
 * failure with an empty message.
 */
export interface FailureProvider {
  currentFailure(): CodedError | undefined
}

/**
 * Accepts failures as they are raised during execution.
 *
 * Implementations coerce whatever they are given; `undefined` and `null`
 * are accepted and mean "nothing failed".
 */
export interface FailureSink {
  push(error: unknown): void
}
