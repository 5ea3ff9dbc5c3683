/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { escapeAttribute, escapeText, isValidName } from './escape';
import { isTextual, NodeType, nodeTypeToString } from './node-types';

describe('escape', () => {
  it('escapes markup characters in text', () => {
    expect(escapeText('a<b & c>d\r\n"')).toBe('a&lt;b &amp; c&gt;d&#13;\n"');
  });

  it('also escapes quotes and whitespace controls in attributes', () => {
    expect(escapeAttribute('"x"\t<y>\n')).toBe('&quot;x&quot;&#9;&lt;y&gt;&#10;');
  });

  it('accepts XML names', () => {
    expect(isValidName('Entry')).toBe(true);
    expect(isValidName('kp:Entry-2.v_1')).toBe(true);
    expect(isValidName('_x')).toBe(true);
    expect(isValidName('Größe')).toBe(true);
  });

  it('rejects invalid names', () => {
    expect(isValidName('')).toBe(false);
    expect(isValidName('1abc')).toBe(false);
    expect(isValidName('a b')).toBe(false);
    expect(isValidName('-a')).toBe(false);
  });
});

describe('node-types', () => {
  it('names node types', () => {
    expect(nodeTypeToString(NodeType.EndElement)).toBe('EndElement');
    expect(nodeTypeToString(NodeType.SignificantWhitespace)).toBe('SignificantWhitespace');
  });

  it('treats character data as textual', () => {
    expect(isTextual(NodeType.Text)).toBe(true);
    expect(isTextual(NodeType.CDATA)).toBe(true);
    expect(isTextual(NodeType.Comment)).toBe(false);
    expect(isTextual(NodeType.Element)).toBe(false);
  });
});
