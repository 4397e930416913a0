import { format } from "node:util"
import type { ErrorKind } from "../../ports/failure"
import { CodedFailure } from "../coded-failure"
import { ErrorKinds, kindDiagnostic } from "../error-kinds"

export type CreateFailureOptions = Readonly<{
  cause?: unknown
}>

/**
 * Build a failure of the given kind.
 *
 * An empty message means nothing failed, so the result is `undefined`.
 *
 * @example
 * ```ts
 * latch.push(createFailure(ErrorKinds.InsufficientGas, "gas exhausted"))
 * ```
 */
export function createFailure(
  kind: ErrorKind,
  message: string,
  options?: CreateFailureOptions,
): CodedFailure | undefined {
  if (message === "") return undefined

  return new CodedFailure(message, { kind, ...options })
}

/**
 * `createFailure` with a printf-style message (`%s`, `%d`, `%j`, ...).
 */
export function createFailuref(
  kind: ErrorKind,
  template: string,
  ...args: unknown[]
): CodedFailure | undefined {
  return createFailure(kind, format(template, ...args))
}

/**
 * `createFailuref` with the generic kind.
 */
export function failuref(template: string, ...args: unknown[]): CodedFailure | undefined {
  return createFailuref(ErrorKinds.Generic, template, ...args)
}

/**
 * A bare kind raised as a failure, e.g. `"Error 9: Call stack overflow"`.
 */
export function kindFailure(kind: ErrorKind): CodedFailure {
  return new CodedFailure(kindDiagnostic(kind), { kind })
}
