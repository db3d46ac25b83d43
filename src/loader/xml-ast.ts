import { SaxesParser } from 'saxes';

/** Line and column origin for diagnostics and traceability. */
export interface XmlLocation {
  line: number;
  column: number;
}

/** Minimal XML node shape consumed by the model builder. */
export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text: string;
  location: XmlLocation;
  path: string;
}

/** Parse failure wrapper that keeps source coordinates when available. */
export class XmlParseError extends Error {
  readonly source?: XmlLocation;

  constructor(message: string, source?: XmlLocation) {
    super(message);
    this.name = 'XmlParseError';
    this.source = source;
  }
}

/** Attribute payload shapes saxes hands out with and without namespace processing. */
type RawAttributes = Record<string, string | { value: string }>;

/**
 * Parse XML into a lightweight AST with location and stable XPath-like paths.
 * The tree is assembled from SAX callbacks with an explicit stack, so document
 * depth never turns into call-stack depth.
 */
export function parseXmlToAst(xmlText: string, sourceName?: string): XmlNode {
  // Namespace processing stays off: undeclared prefixes such as `xsi:` are common
  // in generated reports and would otherwise be fatal.
  const parser = new SaxesParser({
    position: true,
    fileName: sourceName
  });

  let root: XmlNode | undefined;
  const stack: XmlNode[] = [];
  const childNameCounts = new Map<XmlNode, Map<string, number>>();
  const openTagLocations: XmlLocation[] = [];
  let parseError: XmlParseError | undefined;

  parser.on('error', (error) => {
    if (!parseError) {
      parseError = new XmlParseError(error.message, {
        line: parser.line,
        column: parser.column + 1
      });
    }
  });

  parser.on('opentagstart', () => {
    openTagLocations.push({
      line: parser.line,
      column: parser.column + 1
    });
  });

  parser.on('opentag', (tag) => {
    const start = openTagLocations.pop() ?? { line: parser.line, column: parser.column + 1 };
    const parent = stack.at(-1);
    const name = localName(tag.name);

    const node: XmlNode = {
      name,
      attributes: toAttributeMap(tag.attributes),
      children: [],
      text: '',
      location: start,
      path: buildPath(parent, name, childNameCounts)
    };

    if (parent) {
      parent.children.push(node);
    } else {
      root = node;
    }

    stack.push(node);
  });

  parser.on('text', (text) => {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  });

  parser.on('cdata', (text) => {
    const current = stack.at(-1);
    if (current) {
      current.text += text;
    }
  });

  parser.on('closetag', () => {
    const closed = stack.pop();
    if (closed) {
      childNameCounts.delete(closed);
    }
  });

  parser.write(xmlText).close();

  if (parseError) {
    throw parseError;
  }

  if (!root) {
    throw new XmlParseError('No XML root element found');
  }

  return root;
}

/** Drop namespace prefixes so downstream logic can stay prefix-agnostic. */
function localName(name: string): string {
  const index = name.indexOf(':');
  return index === -1 ? name : name.slice(index + 1);
}

/**
 * Normalize SAX attribute payload into string values.
 * Prefixed attributes are reachable under both the qualified and the local name.
 */
function toAttributeMap(attributes: RawAttributes): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [key, raw] of Object.entries(attributes)) {
    const value = typeof raw === 'string' ? raw : raw.value;
    out[key] = value;

    const local = localName(key);
    if (local !== key && !Object.hasOwn(out, local)) {
      out[local] = value;
    }
  }

  return out;
}

/** Build deterministic node paths with sibling indexes (for diagnostics). */
function buildPath(
  parent: XmlNode | undefined,
  name: string,
  childNameCounts: Map<XmlNode, Map<string, number>>
): string {
  if (!parent) {
    return `/${name}[1]`;
  }

  let counts = childNameCounts.get(parent);
  if (!counts) {
    counts = new Map<string, number>();
    childNameCounts.set(parent, counts);
  }

  const next = (counts.get(name) ?? 0) + 1;
  counts.set(name, next);
  return `${parent.path}/${name}[${next}]`;
}
