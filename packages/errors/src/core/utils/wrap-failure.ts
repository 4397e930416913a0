import { CodedFailure } from "../coded-failure"
import { toFailure } from "./to-failure"

/**
 * Prefix a failure with context while keeping its kind.
 *
 * The inner failure becomes the `cause`, so {@link failureChain} can walk
 * back through every layer. Wrapping nothing yields nothing.
 *
 * @example
 * ```ts
 * wrapFailure(err, "CALL 0x42") // "CALL 0x42: stack underflow"
 * ```
 */
export function wrapFailure(value: unknown, message: string): CodedFailure | undefined {
  const inner = toFailure(value)
  if (inner === undefined) return undefined

  return new CodedFailure(`${message}: ${inner.message}`, {
    kind: inner.kind,
    cause: inner,
  })
}
