import { CodedFailure } from "../coded-failure"

/**
 * Walk `cause` links from a (possibly wrapped) failure and return every
 * CodedFailure on the way, outermost first.
 *
 * Stops at the first cause that is not a CodedFailure, on a cycle, or after
 * `maxDepth` entries.
 */
export function failureChain(value: unknown, maxDepth: number = 50): CodedFailure[] {
  const chain: CodedFailure[] = []
  const seen = new WeakSet<CodedFailure>()

  let current: unknown = value

  while (current instanceof CodedFailure && chain.length < maxDepth) {
    if (seen.has(current)) break
    seen.add(current)

    chain.push(current)
    current = current.cause
  }

  return chain
}

/**
 * The innermost CodedFailure behind any number of wraps.
 */
export function rootFailure(value: unknown): CodedFailure | undefined {
  return failureChain(value).at(-1)
}
