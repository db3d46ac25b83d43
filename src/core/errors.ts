import type { DiagnosticSource } from './diagnostics.js';

/** Names of the per-file failures the pipeline records instead of throwing. */
export type FileErrorKind = 'NotFoundError' | 'ParseError' | 'StructureError' | 'CancelledError';

/** Input report path does not exist. */
export class NotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Report file not found: ${path}`);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/** Input report is not well-formed XML. Keeps source coordinates when available. */
export class ParseError extends Error {
  readonly path: string;
  readonly reason: string;
  readonly source?: DiagnosticSource;

  constructor(path: string, reason: string, source?: DiagnosticSource) {
    super(`Failed to parse ${path}: ${reason}`);
    this.name = 'ParseError';
    this.path = path;
    this.reason = reason;
    this.source = source;
  }
}

/** Report structure cannot be turned into a test run (e.g. suites nested too deeply). */
export class StructureError extends Error {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Unsupported report structure in ${path}: ${reason}`);
    this.name = 'StructureError';
    this.path = path;
    this.reason = reason;
  }
}

/** Load was never started because the invocation was aborted. */
export class CancelledError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Loading ${path} was cancelled`);
    this.name = 'CancelledError';
    this.path = path;
  }
}

/** Per-file failure union carried through load outcomes and the summary. */
export type FileError = NotFoundError | ParseError | StructureError | CancelledError;

/** Destination directory or file could not be written. Fatal to the invocation. */
export class WriteError extends Error {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Failed to write ${path}: ${reason}`);
    this.name = 'WriteError';
    this.path = path;
    this.reason = reason;
  }
}

/** No input produced a test run. Fatal to the invocation. */
export class NoUsableInputError extends Error {
  readonly failures: readonly FileError[];

  constructor(failures: readonly FileError[]) {
    super(
      failures.length === 0
        ? 'No report files were supplied'
        : `None of the ${failures.length} report file(s) could be used`
    );
    this.name = 'NoUsableInputError';
    this.failures = failures;
  }
}

/** Caller aborted the invocation before outputs were written. */
export class PipelineCancelledError extends Error {
  constructor() {
    super('Pipeline was cancelled before producing output');
    this.name = 'PipelineCancelledError';
  }
}

/** Validation error for a malformed configuration file. */
export class ConfigError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`Config error in ${filePath}: ${message}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
  }
}

/** Best-effort message extraction for unknown thrown values. */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
