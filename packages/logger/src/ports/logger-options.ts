import type { Writable } from "node:stream"
import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Concrete adapters must honor
 * them but are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   * Leave disabled where structured JSON logs are ingested.
   */
  prettify?: boolean
}

/**
 * Runtime dependencies of an adapter, kept apart from policy options.
 */
export type LoggerDependencies = {
  /** Where log lines are written. Defaults to stdout. */
  destination?: Writable
}
