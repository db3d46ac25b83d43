import type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
import { log } from '../core/logger.js';
import type { XmlNode } from '../loader/xml-ast.js';

/** Mutable state shared by model builder passes for one report. */
export interface BuildContext {
  sourcePath: string;
  diagnostics: Diagnostic[];
}

/** Create a builder context for one report. */
export function createBuildContext(sourcePath: string): BuildContext {
  return {
    sourcePath,
    diagnostics: []
  };
}

/**
 * Record a diagnostic entry and mirror it to the model logger.
 * Nothing the builder tolerates goes unrecorded.
 */
export function addDiagnostic(
  ctx: BuildContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  node?: XmlNode
): void {
  const diagnostic: Diagnostic = {
    code,
    severity,
    message,
    source: node ? { name: ctx.sourcePath, ...node.location } : undefined,
    xmlPath: node?.path
  };
  ctx.diagnostics.push(diagnostic);

  const fields = { path: ctx.sourcePath, code, xmlPath: node?.path };
  if (severity === 'info') {
    log.model.debug(fields, message);
  } else {
    log.model.warn(fields, message);
  }
}
