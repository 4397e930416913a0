import type { HasErrorKind } from "../../ports/failure"
import { isErrorKind } from "../error-kinds"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard for values that carry an error kind, including failures raised
 * by other subsystems that never touched {@link CodedFailure}.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (hasErrorKind(err) && err.kind === ErrorKinds.ExecutionReverted) {
 *     // revert handling
 *   }
 * }
 * ```
 */
export function hasErrorKind(e: unknown): e is HasErrorKind {
  return isRecord(e) && isErrorKind(e.kind)
}
