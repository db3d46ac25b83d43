import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import { CancelledError, describeError, type FileError, NotFoundError, ParseError } from '../core/errors.js';
import { runWithConcurrency } from '../core/execution-loop.js';
import { log } from '../core/logger.js';
import { parseXmlToAst, XmlParseError, type XmlNode } from './xml-ast.js';

/** Raw parse tree for one successfully read report file. */
export interface LoadedReport {
  path: string;
  tree: XmlNode;
}

/** Per-file load result: a tree, or the failure recorded in its place. */
export type LoadOutcome = { ok: true; report: LoadedReport } | { ok: false; error: FileError };

/** Options for loading a batch of report files. */
export interface LoadReportsOptions {
  /** Upper bound on concurrent reads; the pool never exceeds the file count. */
  concurrency?: number;
  /** Aborting stops new reads from starting. Reads already in flight complete. */
  signal?: AbortSignal;
}

/** File extension picked up when a directory is expanded. */
const REPORT_EXTENSION = '.xml';
const DEFAULT_LOAD_CONCURRENCY = 8;

/**
 * Read and parse one report file.
 * Throws `NotFoundError` for a missing file and `ParseError` for anything that
 * is not well-formed XML.
 */
export async function loadReport(filePath: string): Promise<LoadedReport> {
  let xmlText: string;
  try {
    xmlText = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new NotFoundError(filePath);
    }
    throw new ParseError(filePath, `cannot read file (${describeError(error)})`);
  }

  try {
    return { path: filePath, tree: parseXmlToAst(xmlText, filePath) };
  } catch (error) {
    if (error instanceof XmlParseError) {
      throw new ParseError(
        filePath,
        error.message,
        error.source ? { name: filePath, ...error.source } : undefined
      );
    }
    throw error;
  }
}

/**
 * Load every path with a bounded worker pool. Failures are recorded per file and
 * never abort the batch. The returned map follows input order.
 */
export async function loadReports(
  filePaths: readonly string[],
  options: LoadReportsOptions = {}
): Promise<Map<string, LoadOutcome>> {
  const concurrency = Math.min(options.concurrency ?? DEFAULT_LOAD_CONCURRENCY, filePaths.length);

  const outcomes = await runWithConcurrency(filePaths, concurrency, async (filePath): Promise<LoadOutcome> => {
    if (options.signal?.aborted) {
      return { ok: false, error: new CancelledError(filePath) };
    }

    try {
      const report = await loadReport(filePath);
      log.loader.debug({ path: filePath }, 'loaded');
      return { ok: true, report };
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof ParseError) {
        log.loader.warn({ path: filePath, error: error.message }, 'load failed');
        return { ok: false, error };
      }
      throw error;
    }
  });

  const byPath = new Map<string, LoadOutcome>();
  filePaths.forEach((filePath, index) => {
    const outcome = outcomes[index];
    if (outcome && !byPath.has(filePath)) {
      byPath.set(filePath, outcome);
    }
  });
  return byPath;
}

/**
 * Expand directories into the report files beneath them (recursive, sorted).
 * Files and missing paths pass through untouched so the loader reports them.
 */
export async function expandReportPaths(inputs: readonly string[]): Promise<string[]> {
  const expanded: string[] = [];

  for (const input of inputs) {
    const kind = await pathKind(input);
    if (kind !== 'directory') {
      expanded.push(input);
      continue;
    }

    const found = await findReportFiles(input);
    if (found.length === 0) {
      log.loader.warn({ path: input }, 'directory contains no report files');
    }
    expanded.push(...found);
  }

  return expanded;
}

/** Recursively discover `.xml` files under `rootDir`. */
async function findReportFiles(rootDir: string): Promise<string[]> {
  const matches: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
        continue;
      }

      if (entry.name.toLowerCase().endsWith(REPORT_EXTENSION)) {
        matches.push(fullPath);
      } else {
        log.loader.debug({ path: fullPath }, 'skipped non-XML file');
      }
    }
  }

  await walk(rootDir);
  // Directory listing order is filesystem-dependent; sorting keeps run order reproducible.
  return matches.sort();
}

async function pathKind(filePath: string): Promise<'file' | 'directory' | 'missing'> {
  try {
    const info = await stat(filePath);
    return info.isDirectory() ? 'directory' : 'file';
  } catch (error) {
    if (isMissingFileError(error)) {
      return 'missing';
    }
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
