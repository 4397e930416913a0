/**
 * Stable numeric classification of an execution failure.
 *
 * Any unsigned 32-bit integer is a valid kind; the declared members live in
 * `ErrorKinds` and unknown values describe themselves as "Unknown error".
 */
export type ErrorKind = number

/**
 * Anything that exposes an error kind, whether or not it is an `Error`.
 */
export interface HasErrorKind {
  readonly kind: ErrorKind
}

export interface CodedError extends Error, HasErrorKind {
  /** Diagnostic text, exactly as raised. Never empty. */
  readonly message: string
}
