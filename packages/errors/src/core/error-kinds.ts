import type { ErrorKind } from "../ports/failure"

/**
 * Declared error kinds.
 *
 * Identities are part of the public contract: append new members at the
 * end and never renumber existing ones.
 */
export const ErrorKinds = {
  Generic: 0,
  UnknownAddress: 1,
  InsufficientBalance: 2,
  InvalidJumpDest: 3,
  InsufficientGas: 4,
  MemoryOutOfBounds: 5,
  CodeOutOfBounds: 6,
  InputOutOfBounds: 7,
  ReturnDataOutOfBounds: 8,
  CallStackOverflow: 9,
  CallStackUnderflow: 10,
  DataStackOverflow: 11,
  DataStackUnderflow: 12,
  InvalidContract: 13,
  NativeContractCodeCopy: 14,
  ExecutionAborted: 15,
  ExecutionReverted: 16,
  PermissionDenied: 17,
  NativeFunction: 18,
  EventPublish: 19,
  InvalidString: 20,
  EventMapping: 21,
  InvalidAddress: 22,
  DuplicateAddress: 23,
  InsufficientFunds: 24,
  Overpayment: 25,
  ZeroPayment: 26,
  InvalidSequence: 27,
  ReservedAddress: 28,
  IllegalWrite: 29,
  IntegerOverflow: 30,
  InvalidProposal: 31,
  ExpiredProposal: 32,
  ProposalExecuted: 33,
  NoInputPermission: 34,
  AlreadyVoted: 35,
} as const

export type ErrorKindName = keyof typeof ErrorKinds
export type KnownErrorKind = (typeof ErrorKinds)[ErrorKindName]

export const UNKNOWN_ERROR_DESCRIPTION = "Unknown error"

const MAX_ERROR_KIND = 0xffff_ffff

const descriptions: Readonly<Record<KnownErrorKind, string>> = {
  [ErrorKinds.Generic]: "Generic error",
  [ErrorKinds.UnknownAddress]: "Unknown address",
  [ErrorKinds.InsufficientBalance]: "Insufficient balance",
  [ErrorKinds.InvalidJumpDest]: "Invalid jump dest",
  [ErrorKinds.InsufficientGas]: "Insufficient gas",
  [ErrorKinds.MemoryOutOfBounds]: "Memory out of bounds",
  [ErrorKinds.CodeOutOfBounds]: "Code out of bounds",
  [ErrorKinds.InputOutOfBounds]: "Input out of bounds",
  [ErrorKinds.ReturnDataOutOfBounds]: "Return data out of bounds",
  [ErrorKinds.CallStackOverflow]: "Call stack overflow",
  [ErrorKinds.CallStackUnderflow]: "Call stack underflow",
  [ErrorKinds.DataStackOverflow]: "Data stack overflow",
  [ErrorKinds.DataStackUnderflow]: "Data stack underflow",
  [ErrorKinds.InvalidContract]: "Invalid contract",
  [ErrorKinds.NativeContractCodeCopy]: "Tried to copy native contract code",
  [ErrorKinds.ExecutionAborted]: "Execution aborted",
  [ErrorKinds.ExecutionReverted]: "Execution reverted",
  [ErrorKinds.PermissionDenied]: "Permission denied",
  [ErrorKinds.NativeFunction]: "Native function error",
  [ErrorKinds.EventPublish]: "Event publish error",
  [ErrorKinds.InvalidString]: "Invalid string",
  [ErrorKinds.EventMapping]: "Event mapping error",
  [ErrorKinds.InvalidAddress]: "Invalid address",
  [ErrorKinds.DuplicateAddress]: "Duplicate address",
  [ErrorKinds.InsufficientFunds]: "Insufficient funds",
  [ErrorKinds.Overpayment]: "Overpayment",
  [ErrorKinds.ZeroPayment]: "Zero payment error",
  [ErrorKinds.InvalidSequence]: "Invalid sequence number",
  [ErrorKinds.ReservedAddress]: "Address is reserved for SNative or internal use",
  [ErrorKinds.IllegalWrite]: "Callee attempted to illegally modify state",
  [ErrorKinds.IntegerOverflow]: "Integer overflow",
  [ErrorKinds.InvalidProposal]: "Proposal is invalid",
  [ErrorKinds.ExpiredProposal]: "Proposal is expired since sequence number does not match",
  [ErrorKinds.ProposalExecuted]: "Proposal has already been executed",
  [ErrorKinds.NoInputPermission]: "Account has no input permission",
  [ErrorKinds.AlreadyVoted]: "Vote already registered for this address",
}

function isErrorKindName(name: string): name is ErrorKindName {
  return Object.hasOwn(ErrorKinds, name)
}

const names: ReadonlyMap<ErrorKind, ErrorKindName> = new Map(
  Object.keys(ErrorKinds)
    .filter(isErrorKindName)
    .map((name): [ErrorKind, ErrorKindName] => [ErrorKinds[name], name]),
)

/**
 * `true` if `value` is an integer a failure may carry as its kind.
 * Undeclared kinds are still valid; they describe as "Unknown error".
 */
export function isErrorKind(value: unknown): value is ErrorKind {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_ERROR_KIND
  )
}

export function isKnownErrorKind(value: unknown): value is KnownErrorKind {
  return isErrorKind(value) && Object.hasOwn(descriptions, value)
}

/**
 * Canonical description of a kind. Total: anything undeclared yields
 * {@link UNKNOWN_ERROR_DESCRIPTION}.
 */
export function describeErrorKind(kind: ErrorKind): string {
  return isKnownErrorKind(kind) ? descriptions[kind] : UNKNOWN_ERROR_DESCRIPTION
}

/** Symbolic member name, e.g. `"InsufficientGas"`. */
export function errorKindName(kind: ErrorKind): ErrorKindName | undefined {
  return names.get(kind)
}

/**
 * The text a bare kind produces when it stands in for a failure.
 *
 * @example
 * ```ts
 * kindDiagnostic(ErrorKinds.InsufficientGas) // "Error 4: Insufficient gas"
 * ```
 */
export function kindDiagnostic(kind: ErrorKind): string {
  return `Error ${kind}: ${describeErrorKind(kind)}`
}
