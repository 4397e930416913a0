import type { CodedError, ErrorKind } from "../ports/failure"
import { describeErrorKind, isErrorKind } from "./error-kinds"

export type CodedFailureOptions = Readonly<{
  kind: ErrorKind
  cause?: unknown
}>

/**
 * One failure occurrence: an error kind plus its diagnostic message.
 *
 * `message` is the user-facing diagnostic and is never decorated. Use
 * {@link CodedFailure.toDebugString} for log lines that should carry the
 * numeric kind as well.
 *
 * Prefer {@link createFailure} over the constructor: it maps an empty
 * message to `undefined` (no failure) instead of throwing.
 */
export class CodedFailure extends Error implements CodedError {
  declare readonly message: string
  readonly kind: ErrorKind

  constructor(message: string, options: CodedFailureOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    if (message === "") {
      throw new RangeError("CodedFailure requires a non-empty message")
    }

    if (!isErrorKind(options.kind)) {
      throw new RangeError(`Invalid error kind: ${String(options.kind)}`)
    }

    this.name = this.constructor.name
    this.kind = options.kind
  }

  /**
   * @example
   * ```ts
   * new CodedFailure("gas exhausted", { kind: ErrorKinds.InsufficientGas }).toDebugString()
   * // "Error 4 (Insufficient gas): gas exhausted"
   * ```
   */
  toDebugString(): string {
    return `Error ${this.kind} (${describeErrorKind(this.kind)}): ${this.message}`
  }
}
