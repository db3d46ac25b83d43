import type { XmlNode } from './xml-ast.js';

/** Return first child matching `name`, if present. */
export function firstChild(node: XmlNode | undefined, name: string): XmlNode | undefined {
  if (!node) {
    return undefined;
  }

  return node.children.find((child) => child.name === name);
}

/** Return all children matching `name`. */
export function childrenOf(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) {
    return [];
  }

  return node.children.filter((child) => child.name === name);
}

/** Return trimmed node text, or `undefined` when empty/missing. */
export function textOf(node: XmlNode | undefined): string | undefined {
  if (!node) {
    return undefined;
  }

  const text = node.text.trim();
  return text.length > 0 ? text : undefined;
}

/** Read attribute `name` from a node, if available. */
export function attribute(node: XmlNode | undefined, name: string): string | undefined {
  return node?.attributes[name];
}

/** Read the first present attribute among `names`, in order. */
export function firstAttribute(node: XmlNode | undefined, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = attribute(node, name);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/** Parse base-10 integer values with `undefined` on failure. */
export function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const THOUSANDS_PATTERN = /^\d{1,3}(,\d{3})+(\.\d+)?$/;

/**
 * Parse plain decimal values with `undefined` on failure.
 * Grouped thousands (`1,234.5`) are accepted; any other comma (`0,5`) and
 * non-decimal forms (`0x10`, `Infinity`) are rejected.
 */
export function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  const normalized = THOUSANDS_PATTERN.test(trimmed) ? trimmed.replaceAll(',', '') : trimmed;
  if (!DECIMAL_PATTERN.test(normalized)) {
    return undefined;
  }

  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : undefined;
}
