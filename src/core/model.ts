import type { Diagnostic } from './diagnostics.js';

/** Stable status categories in their fixed reporting order. */
export const TEST_STATUSES = ['passed', 'failed', 'error', 'skipped'] as const;
/** Closed status variant produced by status normalization. */
export type TestStatus = (typeof TEST_STATUSES)[number];

/** Per-status case counts. */
export type StatusCounts = Record<TestStatus, number>;

/** Identity of one test case; unique within a test run after normalization. */
export interface TestCaseIdentity {
  readonly suiteName: string;
  readonly classname: string;
  readonly name: string;
}

/** One normalized test case. */
export interface TestCase extends TestCaseIdentity {
  readonly status: TestStatus;
  readonly durationSeconds: number;
  /** Last dotted segment of `classname`, empty when there is no classname. */
  readonly testClass: string;
  readonly failureMessage?: string;
  readonly skippedMessage?: string;
  readonly systemOut?: string;
  readonly timestamp?: string;
}

/** Flattened suite with its direct cases and derived totals. */
export interface TestSuite {
  readonly name: string;
  readonly cases: readonly TestCase[];
  readonly totalDurationSeconds: number;
  readonly statusCounts: Readonly<StatusCounts>;
  readonly timestamp?: string;
}

/** Normalized result of one input report file. */
export interface TestRun {
  readonly sourcePath: string;
  readonly suites: readonly TestSuite[];
  readonly loadedAt: string;
  readonly diagnostics: readonly Diagnostic[];
}

/** Zeroed status counter in category order. */
export function emptyStatusCounts(): StatusCounts {
  return { passed: 0, failed: 0, error: 0, skipped: 0 };
}

/** Count statuses of a case list. */
export function countStatuses(cases: Iterable<{ status: TestStatus }>): StatusCounts {
  const counts = emptyStatusCounts();
  for (const testCase of cases) {
    counts[testCase.status] += 1;
  }
  return counts;
}

/** Map key for identity lookups; unambiguous even when names contain separators. */
export function identityKey(identity: TestCaseIdentity): string {
  return JSON.stringify([identity.suiteName, identity.classname, identity.name]);
}

/** Project the identity fields out of a case (or any identity-shaped value). */
export function toIdentity(identity: TestCaseIdentity): TestCaseIdentity {
  return { suiteName: identity.suiteName, classname: identity.classname, name: identity.name };
}

/** Human-readable identity label used in charts and markdown. */
export function formatIdentity(identity: TestCaseIdentity): string {
  const qualifiedName = identity.classname ? `${identity.classname}.${identity.name}` : identity.name;
  return identity.suiteName ? `${identity.suiteName} :: ${qualifiedName}` : qualifiedName;
}

/** Locale-independent code-unit comparison so ordering does not depend on the host. */
export function compareText(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

/** Alphabetical identity order: suite, then classname, then case name. */
export function compareIdentity(left: TestCaseIdentity, right: TestCaseIdentity): number {
  return (
    compareText(left.suiteName, right.suiteName) ||
    compareText(left.classname, right.classname) ||
    compareText(left.name, right.name)
  );
}

