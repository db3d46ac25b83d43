import { describe, expect, it } from 'vitest';

import { parseXmlToAst, XmlParseError } from '../../src/loader/xml-ast.js';
import { attribute, parseOptionalFloat, parseOptionalInt, textOf } from '../../src/loader/xml-utils.js';

describe('xml AST builder', () => {
  it('builds element paths with sibling indexes', () => {
    const ast = parseXmlToAst('<root><child /><child><inner /></child></root>');

    expect(ast.path).toBe('/root[1]');
    expect(ast.children[0]?.path).toBe('/root[1]/child[1]');
    expect(ast.children[1]?.path).toBe('/root[1]/child[2]');
    expect(ast.children[1]?.children[0]?.path).toBe('/root[1]/child[2]/inner[1]');
  });

  it('records the line of each element', () => {
    const ast = parseXmlToAst('<testsuites>\n  <testsuite name="a">\n    <testcase name="x"/>\n  </testsuite>\n</testsuites>');

    expect(ast.location.line).toBe(1);
    expect(ast.children[0]?.location.line).toBe(2);
    expect(ast.children[0]?.children[0]?.location.line).toBe(3);
  });

  it('keeps text and CDATA content', () => {
    const ast = parseXmlToAst('<failure message="m">line one<![CDATA[ & <raw>]]></failure>');
    expect(textOf(ast)).toBe('line one & <raw>');
  });

  it('strips namespace prefixes from element names and exposes prefixed attributes by local name', () => {
    const ast = parseXmlToAst('<ns:testsuite xmlns:ns="urn:x" ns:name="prefixed"><ns:testcase name="a"/></ns:testsuite>');

    expect(ast.name).toBe('testsuite');
    expect(attribute(ast, 'ns:name')).toBe('prefixed');
    expect(attribute(ast, 'name')).toBe('prefixed');
    expect(ast.children[0]?.name).toBe('testcase');
  });

  it('aliases prefixed attributes whose local name shadows an object prototype key', () => {
    const ast = parseXmlToAst('<testsuite xmlns:x="urn:x" x:constructor="ctor" x:toString="text"/>');

    expect(attribute(ast, 'constructor')).toBe('ctor');
    expect(attribute(ast, 'toString')).toBe('text');
  });

  it('tolerates undeclared prefixes such as xsi', () => {
    const ast = parseXmlToAst('<testsuite xsi:noNamespaceSchemaLocation="junit.xsd" name="s"/>');
    expect(attribute(ast, 'name')).toBe('s');
  });

  it('builds very deep documents without recursion', () => {
    const depth = 3000;
    const ast = parseXmlToAst(`${'<a>'.repeat(depth)}${'</a>'.repeat(depth)}`);

    let levels = 1;
    let node = ast;
    while (node.children[0]) {
      node = node.children[0];
      levels += 1;
    }
    expect(levels).toBe(depth);
  });

  it('throws an XmlParseError for malformed XML', () => {
    expect(() => parseXmlToAst('<root><a></root>')).toThrow(XmlParseError);
  });

  it('throws an XmlParseError when there is no root element', () => {
    expect(() => parseXmlToAst('')).toThrow(XmlParseError);
  });
});

describe('xml value helpers', () => {
  it('parses durations with thousands separators and rejects non-numbers', () => {
    expect(parseOptionalFloat('1,234.5')).toBe(1234.5);
    expect(parseOptionalFloat(' 0.25 ')).toBe(0.25);
    expect(parseOptionalFloat('abc')).toBeUndefined();
    expect(parseOptionalFloat('')).toBeUndefined();
    expect(parseOptionalFloat(undefined)).toBeUndefined();
  });

  it('rejects decimal commas, misplaced separators and non-decimal forms', () => {
    expect(parseOptionalFloat('12,345,678')).toBe(12345678);
    expect(parseOptionalFloat('1e3')).toBe(1000);
    expect(parseOptionalFloat('0,5')).toBeUndefined();
    expect(parseOptionalFloat('12,34')).toBeUndefined();
    expect(parseOptionalFloat('1234,567')).toBeUndefined();
    expect(parseOptionalFloat('0x10')).toBeUndefined();
    expect(parseOptionalFloat('Infinity')).toBeUndefined();
  });

  it('parses integers', () => {
    expect(parseOptionalInt('12')).toBe(12);
    expect(parseOptionalInt('x')).toBeUndefined();
  });
});
