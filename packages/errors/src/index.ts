export { CodedFailure, type CodedFailureOptions } from "./core/coded-failure"
export {
  describeErrorKind,
  type ErrorKindName,
  ErrorKinds,
  errorKindName,
  isErrorKind,
  isKnownErrorKind,
  type KnownErrorKind,
  kindDiagnostic,
  UNKNOWN_ERROR_DESCRIPTION,
} from "./core/error-kinds"
export {
  DEFAULTS as FIRST_ERROR_LATCH_DEFAULTS,
  FirstErrorLatch,
  type FirstErrorLatchOptions,
  firstOnly,
  type ResolvedFirstErrorLatchOptions,
  resolveLatchOptions,
} from "./core/first-error-latch"
export { captureInto, throwIfFailed } from "./core/utils/capture"
export {
  type CreateFailureOptions,
  createFailure,
  createFailuref,
  failuref,
  kindFailure,
} from "./core/utils/create-failure"
export { failureChain, rootFailure } from "./core/utils/failure-chain"
export { failuresEqual } from "./core/utils/failures-equal"
export { hasErrorKind } from "./core/utils/has-error-kind"
export { toFailure } from "./core/utils/to-failure"
export { wrapFailure } from "./core/utils/wrap-failure"
export type { CodedError, ErrorKind, HasErrorKind } from "./ports/failure"
export type { FailureProvider, FailureSink } from "./ports/failure-provider"
