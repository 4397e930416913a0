import { CodedFailure } from "../coded-failure"
import { ErrorKinds, kindDiagnostic } from "../error-kinds"
import { createFailure } from "./create-failure"
import { hasErrorKind } from "./has-error-kind"

function diagnosticOf(value: unknown): string {
  if (typeof value === "string") return value
  if (value instanceof Error) return value.message

  if (typeof value === "object" && value !== null && "message" in value) {
    if (typeof value.message === "string") return value.message
  }

  if (hasErrorKind(value)) return kindDiagnostic(value.kind)

  return "Unknown error"
}

/**
 * Convert any raised value to a CodedFailure.
 *
 * - `undefined` and `null` mean nothing failed
 * - CodedFailure passes through unchanged
 * - values exposing a `kind` keep it
 * - everything else gets the generic kind
 *
 * A value whose diagnostic text is empty also yields `undefined`.
 */
export function toFailure(value: unknown): CodedFailure | undefined {
  if (value === undefined || value === null) return undefined
  if (value instanceof CodedFailure) return value

  const kind = hasErrorKind(value) ? value.kind : ErrorKinds.Generic

  return createFailure(kind, diagnosticOf(value), {
    ...(typeof value === "object" && { cause: value }),
  })
}
