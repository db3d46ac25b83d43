import type { TestStatus } from '../core/model.js';
import type { XmlNode } from '../loader/xml-ast.js';
import { firstChild } from '../loader/xml-utils.js';

/** Child elements that encode a status, in priority order. */
const STATUS_ELEMENTS: readonly (readonly [string, TestStatus])[] = [
  ['failure', 'failed'],
  ['error', 'error'],
  ['skipped', 'skipped']
];

/** Attributes that may carry a status string, in priority order. */
const STATUS_ATTRIBUTES = ['status', 'outcome', 'result'] as const;

/** Accepted spellings of attribute-encoded statuses (lower-cased). */
const STATUS_ALIASES: Readonly<Record<string, TestStatus>> = {
  passed: 'passed',
  pass: 'passed',
  success: 'passed',
  successful: 'passed',
  ok: 'passed',
  run: 'passed',
  failed: 'failed',
  fail: 'failed',
  failure: 'failed',
  error: 'error',
  errored: 'error',
  broken: 'error',
  skipped: 'skipped',
  skip: 'skipped',
  ignored: 'skipped',
  disabled: 'skipped',
  pending: 'skipped',
  notrun: 'skipped',
  notexecuted: 'skipped'
};

/** Where a normalized status came from. */
export type StatusEncoding =
  | { kind: 'element'; element: XmlNode }
  | { kind: 'attribute'; attribute: string; raw: string }
  | { kind: 'default' };

/** Normalization result; `recognized` is false when an unknown string was coerced to `error`. */
export interface NormalizedStatus {
  status: TestStatus;
  encoding: StatusEncoding;
  recognized: boolean;
}

/**
 * Resolve the status of one `<testcase>` by trying each known encoding in a fixed
 * order: status child elements, then status attributes, then the implicit pass.
 */
export function normalizeStatus(caseNode: XmlNode): NormalizedStatus {
  for (const [elementName, status] of STATUS_ELEMENTS) {
    const element = firstChild(caseNode, elementName);
    if (element) {
      return { status, encoding: { kind: 'element', element }, recognized: true };
    }
  }

  for (const attributeName of STATUS_ATTRIBUTES) {
    const raw = caseNode.attributes[attributeName];
    if (raw === undefined) {
      continue;
    }

    const encoding: StatusEncoding = { kind: 'attribute', attribute: attributeName, raw };
    const status = parseStatusString(raw);
    return status
      ? { status, encoding, recognized: true }
      : { status: 'error', encoding, recognized: false };
  }

  return { status: 'passed', encoding: { kind: 'default' }, recognized: true };
}

/** Map a free-form status string onto the closed status set. */
export function parseStatusString(raw: string): TestStatus | undefined {
  const key = raw.trim().toLowerCase().replaceAll(/[\s_-]/g, '');
  return Object.hasOwn(STATUS_ALIASES, key) ? STATUS_ALIASES[key] : undefined;
}
