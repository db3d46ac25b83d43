import { StructureError } from '../core/errors.js';
import {
  countStatuses,
  identityKey,
  type StatusCounts,
  type TestCase,
  type TestRun,
  type TestSuite
} from '../core/model.js';
import { log } from '../core/logger.js';
import type { XmlNode } from '../loader/xml-ast.js';
import {
  attribute,
  childrenOf,
  firstAttribute,
  firstChild,
  parseOptionalFloat,
  parseOptionalInt,
  textOf
} from '../loader/xml-utils.js';
import { addDiagnostic, createBuildContext, type BuildContext } from './build-context.js';
import { normalizeStatus } from './status.js';

/** Model builder options for one report tree. */
export interface BuildOptions {
  sourcePath: string;
  /** Deepest allowed suite nesting; deeper input fails with `StructureError`. */
  maxDepth?: number;
  /** Clock override for `loadedAt`. */
  now?: () => Date;
}

export const DEFAULT_MAX_DEPTH = 64;

/** Separator between nested suite names in a flattened suite name. */
export const SUITE_PATH_SEPARATOR = '/';

/** Timestamp prefix some runners print on the first line of `<system-out>`. */
const SYSTEM_OUT_TIMESTAMP = /^(\d{8} \d{2}:\d{2}:\d{2})/;

/** One `<testsuite>` element waiting on the traversal stack. */
interface SuiteFrame {
  node: XmlNode;
  parentPath: string[];
  depth: number;
}

/** Accumulates cases for one qualified suite name; later duplicates replace earlier ones in place. */
interface SuiteAccumulator {
  name: string;
  cases: Map<string, TestCase>;
  timestamp?: string;
}

/**
 * Convert one report tree into a `TestRun`.
 * Nested suites are flattened with an explicit stack in document order; nothing
 * in the walk recurses, and nesting beyond `maxDepth` is rejected.
 */
export function buildTestRun(tree: XmlNode, options: BuildOptions): TestRun {
  const ctx = createBuildContext(options.sourcePath);
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const suites = new Map<string, SuiteAccumulator>();
  let unnamedSuiteCount = 0;

  const stack: SuiteFrame[] = [];
  if (tree.name === 'testsuite') {
    stack.push({ node: tree, parentPath: [], depth: 1 });
  } else {
    // `<testsuites>` or an unrecognized wrapper: cases placed directly under it
    // form an implicit suite named after the root.
    const looseCases = childrenOf(tree, 'testcase');
    if (looseCases.length > 0) {
      const implicitName = attribute(tree, 'name')?.trim() || tree.name;
      collectCases(ctx, suites, implicitName, looseCases, attribute(tree, 'timestamp'));
    }
    pushSuites(stack, childrenOf(tree, 'testsuite'), [], 1);
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) {
      break;
    }

    if (frame.depth > maxDepth) {
      throw new StructureError(
        options.sourcePath,
        `suite nesting exceeds the maximum depth of ${maxDepth} at ${frame.node.path}`
      );
    }

    let name = attribute(frame.node, 'name')?.trim();
    if (!name) {
      unnamedSuiteCount += 1;
      name = `suite-${unnamedSuiteCount}`;
      addDiagnostic(ctx, 'MISSING_SUITE_NAME', 'info', `<testsuite> has no name; using '${name}'.`, frame.node);
    }

    const suitePath = [...frame.parentPath, name];
    const caseNodes = childrenOf(frame.node, 'testcase');
    const childSuites = childrenOf(frame.node, 'testsuite');

    // Pure containers (only nested suites) are not emitted as suites of their own.
    if (caseNodes.length > 0 || childSuites.length === 0) {
      const qualifiedName = suitePath.join(SUITE_PATH_SEPARATOR);
      const parsed = collectCases(ctx, suites, qualifiedName, caseNodes, attribute(frame.node, 'timestamp'));
      if (childSuites.length === 0) {
        checkDeclaredCounts(ctx, frame.node, countStatuses(parsed), parsed.length);
      }
    }

    pushSuites(stack, childSuites, suitePath, frame.depth + 1);
  }

  if (suites.size === 0) {
    addDiagnostic(ctx, 'NO_TEST_SUITES', 'warning', 'Report contains no test suites or test cases.', tree);
  }

  const run: TestRun = {
    sourcePath: options.sourcePath,
    suites: [...suites.values()].map(finalizeSuite),
    loadedAt: (options.now?.() ?? new Date()).toISOString(),
    diagnostics: ctx.diagnostics
  };

  log.model.debug(
    { path: options.sourcePath, suites: run.suites.length, diagnostics: ctx.diagnostics.length },
    'built test run'
  );
  return run;
}

/** Push suites so they pop in document order. */
function pushSuites(stack: SuiteFrame[], nodes: XmlNode[], parentPath: string[], depth: number): void {
  for (let index = nodes.length - 1; index >= 0; index -= 1) {
    const node = nodes[index];
    if (node) {
      stack.push({ node, parentPath, depth });
    }
  }
}

/** Parse `<testcase>` nodes into the accumulator for `suiteName` and return what was parsed. */
function collectCases(
  ctx: BuildContext,
  suites: Map<string, SuiteAccumulator>,
  suiteName: string,
  caseNodes: XmlNode[],
  timestamp: string | undefined
): TestCase[] {
  let accumulator = suites.get(suiteName);
  if (!accumulator) {
    accumulator = { name: suiteName, cases: new Map<string, TestCase>(), timestamp };
    suites.set(suiteName, accumulator);
  }

  const parsed: TestCase[] = [];
  for (const caseNode of caseNodes) {
    const testCase = parseTestCase(ctx, caseNode, suiteName);
    if (!testCase) {
      continue;
    }

    const key = identityKey(testCase);
    if (accumulator.cases.has(key)) {
      addDiagnostic(
        ctx,
        'DUPLICATE_TEST_CASE',
        'warning',
        `Duplicate test case '${testCase.classname}.${testCase.name}' in suite '${suiteName}'; keeping the last occurrence.`,
        caseNode
      );
    }
    accumulator.cases.set(key, testCase);
    parsed.push(testCase);
  }

  return parsed;
}

/** Parse one `<testcase>`; returns `undefined` when the case has no name. */
function parseTestCase(ctx: BuildContext, node: XmlNode, suiteName: string): TestCase | undefined {
  const name = attribute(node, 'name')?.trim();
  if (!name) {
    addDiagnostic(ctx, 'MISSING_CASE_NAME', 'warning', '<testcase> is missing its name attribute; case ignored.', node);
    return undefined;
  }

  const classname = firstAttribute(node, ['classname', 'class'])?.trim() ?? '';
  const normalized = normalizeStatus(node);
  if (!normalized.recognized && normalized.encoding.kind === 'attribute') {
    addDiagnostic(
      ctx,
      'UNKNOWN_STATUS',
      'warning',
      `Unrecognized ${normalized.encoding.attribute} '${normalized.encoding.raw}' on test case '${name}'; treating as error.`,
      node
    );
  }

  const systemOut = textOf(firstChild(node, 'system-out'));
  const statusElement = normalized.encoding.kind === 'element' ? normalized.encoding.element : undefined;

  let failureMessage: string | undefined;
  let skippedMessage: string | undefined;
  if (statusElement && (normalized.status === 'failed' || normalized.status === 'error')) {
    failureMessage = firstLine(attribute(statusElement, 'message') ?? textOf(statusElement));
  } else if (statusElement && normalized.status === 'skipped') {
    skippedMessage = attribute(statusElement, 'message')?.trim() || textOf(statusElement);
  }

  return {
    suiteName,
    classname,
    name,
    status: normalized.status,
    durationSeconds: readDuration(ctx, node, name),
    testClass: classname.split('.').at(-1) ?? '',
    failureMessage,
    skippedMessage,
    systemOut,
    timestamp: readCaseTimestamp(node, systemOut)
  };
}

/** Read `time` (or `duration`) seconds; missing or invalid values become 0. */
function readDuration(ctx: BuildContext, node: XmlNode, caseName: string): number {
  const raw = firstAttribute(node, ['time', 'duration']);
  if (raw === undefined) {
    addDiagnostic(ctx, 'MISSING_DURATION', 'info', `Test case '${caseName}' has no duration; using 0.`, node);
    return 0;
  }

  const parsed = parseOptionalFloat(raw);
  if (parsed === undefined || parsed < 0) {
    addDiagnostic(
      ctx,
      'INVALID_DURATION',
      'warning',
      `Test case '${caseName}' has invalid duration '${raw}'; using 0.`,
      node
    );
    return 0;
  }

  return parsed;
}

/** Timestamp from the attribute, a `<timestamp>` child, or the first `<system-out>` line. */
function readCaseTimestamp(node: XmlNode, systemOut: string | undefined): string | undefined {
  const explicit = attribute(node, 'timestamp')?.trim() || textOf(firstChild(node, 'timestamp'));
  if (explicit) {
    return explicit;
  }

  const firstOutputLine = firstLine(systemOut);
  return firstOutputLine ? SYSTEM_OUT_TIMESTAMP.exec(firstOutputLine)?.[1] : undefined;
}

/** Compare `tests`/`failures`/`errors`/`skipped` attributes with what was parsed. */
function checkDeclaredCounts(ctx: BuildContext, node: XmlNode, observed: StatusCounts, total: number): void {
  const declared: [string, number | undefined, number][] = [
    ['tests', parseOptionalInt(attribute(node, 'tests')), total],
    ['failures', parseOptionalInt(attribute(node, 'failures')), observed.failed],
    ['errors', parseOptionalInt(attribute(node, 'errors')), observed.error],
    ['skipped', parseOptionalInt(firstAttribute(node, ['skipped', 'skip'])), observed.skipped]
  ];

  const mismatches = declared
    .filter(([, expected, actual]) => expected !== undefined && expected !== actual)
    .map(([label, expected, actual]) => `${label} declared ${expected ?? 0}, found ${actual}`);

  if (mismatches.length > 0) {
    addDiagnostic(ctx, 'SUITE_COUNT_MISMATCH', 'info', `Suite totals differ from its cases: ${mismatches.join('; ')}.`, node);
  }
}

function finalizeSuite(accumulator: SuiteAccumulator): TestSuite {
  const cases = [...accumulator.cases.values()];
  return {
    name: accumulator.name,
    cases,
    totalDurationSeconds: cases.reduce((sum, testCase) => sum + testCase.durationSeconds, 0),
    statusCounts: countStatuses(cases),
    timestamp: accumulator.timestamp
  };
}

function firstLine(value: string | undefined): string | undefined {
  const line = value?.trim().split('\n')[0]?.trim();
  return line && line.length > 0 ? line : undefined;
}
