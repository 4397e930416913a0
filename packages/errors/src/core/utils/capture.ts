import type { FailureProvider, FailureSink } from "../../ports/failure-provider"

/**
 * Run `fn` and hand anything it throws to `sink` instead of propagating it.
 *
 * @returns the function's result, or `undefined` if it threw
 */
export function captureInto<T>(sink: FailureSink, fn: () => T): T | undefined {
  try {
    return fn()
  } catch (err) {
    sink.push(err)
    return undefined
  }
}

/**
 * Re-enter `throw` propagation from a provider.
 */
export function throwIfFailed(provider: FailureProvider): void {
  const failure = provider.currentFailure()

  if (failure !== undefined) {
    throw failure
  }
}
