import { createNullLogger, type Logger } from "@faultline/logger"
import type { FailureProvider, FailureSink } from "../ports/failure-provider"
import type { CodedFailure } from "./coded-failure"
import { errorKindName } from "./error-kinds"
import { toFailure } from "./utils/to-failure"

export interface FirstErrorLatchOptions {
  /**
   * Receives a `debug` entry when a failure is latched and a `trace` entry
   * for every failure ignored afterwards.
   * @default a no-op logger
   */
  logger?: Logger

  /**
   * Value of the `module` field on this latch's log entries.
   * @default "first-error-latch"
   */
  name?: string
}

export type ResolvedFirstErrorLatchOptions = Required<FirstErrorLatchOptions>

export const DEFAULTS = {
  name: "first-error-latch",
} as const

export function resolveLatchOptions(
  options: FirstErrorLatchOptions = {},
): ResolvedFirstErrorLatchOptions {
  return {
    logger: options.logger ?? createNullLogger(),
    name: options.name ?? DEFAULTS.name,
  }
}

/**
 * Keeps only the first failure pushed to it.
 *
 * In an execution trace the first failure is the root cause; whatever is
 * raised afterwards is a downstream symptom and never replaces it.
 * `reset()` clears the latch so it can be reused for the next run.
 *
 * Not safe to share between concurrently running traces: give each branch
 * its own latch.
 *
 * @example
 * ```ts
 * const latch = firstOnly()
 *
 * latch.push(createFailure(ErrorKinds.InsufficientGas, "gas exhausted"))
 * latch.push(createFailure(ErrorKinds.CallStackUnderflow, "stack underflow"))
 *
 * latch.currentFailure()?.kind // ErrorKinds.InsufficientGas
 * ```
 */
export class FirstErrorLatch implements FailureSink, FailureProvider {
  private recorded: CodedFailure | undefined
  private readonly logger: Logger

  constructor(options: FirstErrorLatchOptions = {}) {
    const resolved = resolveLatchOptions(options)

    this.logger = resolved.logger.child({ module: resolved.name })
  }

  get isLatched(): boolean {
    return this.recorded !== undefined
  }

  push(error: unknown): void {
    const failure = toFailure(error)
    if (failure === undefined) return

    if (this.recorded !== undefined) {
      this.logger.trace("Failure suppressed", {
        kind: failure.kind,
        kindName: errorKindName(failure.kind),
        err: failure,
      })
      return
    }

    this.recorded = failure
    this.logger.debug("Failure latched", {
      kind: failure.kind,
      kindName: errorKindName(failure.kind),
      err: failure,
    })
  }

  currentFailure(): CodedFailure | undefined {
    return this.recorded
  }

  reset(): void {
    this.recorded = undefined
  }
}

export function firstOnly(options?: FirstErrorLatchOptions): FirstErrorLatch {
  return new FirstErrorLatch(options)
}
