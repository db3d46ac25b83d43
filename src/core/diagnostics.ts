/** Severity classes used by loader and model builder diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical record for a recoverable condition noticed while reading a report. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  xmlPath?: string;
}

/** String-keyed histogram of diagnostic codes or severities. */
export type DiagnosticHistogram = Record<string, number>;

/** Count diagnostics by code. */
export function buildCodeHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.code] = (histogram[diagnostic.code] ?? 0) + 1;
  }
  return histogram;
}
