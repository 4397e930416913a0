import { toFailure } from "./to-failure"

/**
 * Two failures are equal when both are absent, or both carry the same kind
 * and message. Causes are not compared.
 */
export function failuresEqual(a: unknown, b: unknown): boolean {
  const left = toFailure(a)
  const right = toFailure(b)

  if (left === undefined || right === undefined) {
    return left === undefined && right === undefined
  }

  return left.kind === right.kind && left.message === right.message
}
