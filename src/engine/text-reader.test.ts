/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect, beforeEach } from 'vitest';
import { BufferInput } from '../io/buffer-input';
import { getLastError, resetLastError, XmlErrorCode, XmlErrorDomain, XmlErrorFlags, XmlErrorLevel } from './error-record';
import type { XmlErrorRecord } from './error-record';
import { NodeType } from './node-types';
import { TextReaderEngine } from './text-reader';
import type { TextReaderEngineOptions } from './text-reader';
import type { InputTransport } from './transport';

function engineOver(data: string | Uint8Array, options: Partial<TextReaderEngineOptions> = {}) {
  const input = new BufferInput(data);
  const transport: InputTransport<BufferInput> = {
    context: input,
    read: (ctx, buffer, len) => ctx.read(buffer, len),
    close: (ctx) => {
      ctx.close();
      return 0;
    },
  };
  const engine = new TextReaderEngine(transport, { encoding: 'utf-8', chunkSize: 4096, ...options });
  return { input, engine };
}

function walk(engine: TextReaderEngine<BufferInput>): Array<[number, string, number, boolean]> {
  const nodes: Array<[number, string, number, boolean]> = [];
  while (engine.read() === 1) {
    nodes.push([engine.nodeType(), engine.name(), engine.depth(), engine.isEmptyElement()]);
  }
  return nodes;
}

const DOC =
  '<?xml version="1.0" encoding="utf-8"?>\n' +
  '<File><Meta><Name>db</Name><Empty/></Meta><Root a="1"/></File>';

describe('TextReaderEngine', () => {
  beforeEach(() => resetLastError());

  it('reports nodes with their depth and empty elements collapsed', () => {
    const { engine } = engineOver(DOC);
    expect(walk(engine)).toEqual([
      [NodeType.Element, 'File', 0, false],
      [NodeType.Element, 'Meta', 1, false],
      [NodeType.Element, 'Name', 2, false],
      [NodeType.Text, '#text', 3, false],
      [NodeType.EndElement, 'Name', 2, false],
      [NodeType.Element, 'Empty', 2, true],
      [NodeType.EndElement, 'Meta', 1, false],
      [NodeType.Element, 'Root', 1, true],
      [NodeType.EndElement, 'File', 0, false],
    ]);
    expect(engine.read()).toBe(0);
    expect(engine.read()).toBe(0);
  });

  it('exposes attributes of the current element', () => {
    const { engine } = engineOver('<Root a="1" b="x&amp;y"/>');
    expect(engine.read()).toBe(1);
    expect(engine.getAttribute('a')).toBe('1');
    expect(engine.getAttribute('b')).toBe('x&y');
    expect(engine.getAttribute('c')).toBeUndefined();
    expect(engine.attributeNames()).toEqual(['a', 'b']);
  });

  it('skips a whole subtree with next()', () => {
    const { engine } = engineOver(DOC);
    engine.read();
    engine.read();
    expect(engine.name()).toBe('Meta');
    expect(engine.next()).toBe(1);
    expect(engine.name()).toBe('Root');
  });

  it('does not descend into an empty element with next()', () => {
    const { engine } = engineOver(DOC);
    while (engine.read() === 1 && engine.name() !== 'Empty');
    expect(engine.isEmptyElement()).toBe(true);
    expect(engine.next()).toBe(1);
    expect(engine.nodeType()).toBe(NodeType.EndElement);
    expect(engine.name()).toBe('Meta');
  });

  it('splits prefixed names', () => {
    const { engine } = engineOver('<kp:File xmlns:kp="urn:test"/>');
    engine.read();
    expect(engine.name()).toBe('kp:File');
    expect(engine.localName()).toBe('File');
    expect(engine.prefix()).toBe('kp');
  });

  it('tracks line and column of the current node', () => {
    const multi = engineOver('<root>\n  <a/>\n  <b/>\n</root>').engine;
    while (multi.read() === 1 && multi.name() !== 'b');
    expect(multi.lineNumber()).toBe(3);

    const single = engineOver('<root><a/></root>').engine;
    single.read();
    single.read();
    expect(single.columnNumber()).toBe(10);
  });

  it('delivers nodes before a parse error, then fails', () => {
    const errors: XmlErrorRecord[] = [];
    const { engine } = engineOver('<root><a></b></root>', { onError: (e) => errors.push({ ...e }) });
    expect(engine.read()).toBe(1);
    expect(engine.read()).toBe(1);
    expect(engine.read()).toBe(-1);
    expect(engine.read()).toBe(-1);
    expect(errors).toHaveLength(1);
    expect(errors[0].domain).toBe(XmlErrorDomain.Parser);
    expect(errors[0].code).toBe(XmlErrorCode.TagNameMismatch);
    expect(errors[0].level).toBe(XmlErrorLevel.Fatal);
    expect(getLastError()?.code).toBe(XmlErrorCode.TagNameMismatch);
  });

  it('fails on an unclosed root at end of input', () => {
    const { engine } = engineOver('<root><unclosed>');
    expect(engine.read()).toBe(1);
    expect(engine.read()).toBe(1);
    expect(engine.read()).toBe(-1);
    expect(getLastError()?.code).toBe(XmlErrorCode.TagNotFinished);
  });

  it('fails on an empty document', () => {
    const { engine } = engineOver('  ');
    expect(engine.read()).toBe(-1);
    expect(getLastError()?.code).toBe(XmlErrorCode.DocumentEmpty);
  });

  it('reports a failing read callback as an IO error', () => {
    const transport: InputTransport<null> = { context: null, read: () => -1, close: () => 0 };
    const engine = new TextReaderEngine(transport, { encoding: 'utf-8', chunkSize: 16 });
    expect(engine.read()).toBe(-1);
    const last = getLastError();
    expect(last?.domain).toBe(XmlErrorDomain.IO);
    expect(last?.code).toBe(XmlErrorCode.IoReadFailed);
    expect(last?.flags).toBe(XmlErrorFlags.FromCallback);
  });

  it('rejects a read count that is not an integer', () => {
    for (const count of [Number.NaN, 2.5]) {
      resetLastError();
      const transport: InputTransport<null> = { context: null, read: () => count, close: () => 0 };
      const engine = new TextReaderEngine(transport, { encoding: 'utf-8', chunkSize: 16 });
      expect(engine.read()).toBe(-1);
      expect(getLastError()?.code).toBe(XmlErrorCode.IoReadFailed);
      expect(getLastError()?.message).toBe(`Input read callback returned ${count}`);
    }
  });

  it('keeps attributes whose names clash with object members', () => {
    const { engine } = engineOver('<a __proto__="v" constructor="k"/>');
    engine.read();
    expect(engine.getAttribute('__proto__')).toBe('v');
    expect(engine.getAttribute('constructor')).toBe('k');
    expect(engine.getAttribute('toString')).toBeUndefined();
    expect(engine.attributeNames()).toEqual(['__proto__', 'constructor']);
  });

  it('decodes multi-byte characters split across reads', () => {
    const { engine } = engineOver('<r>héllo €</r>', { chunkSize: 1 });
    engine.read();
    expect(engine.read()).toBe(1);
    expect(engine.nodeType()).toBe(NodeType.Text);
    expect(engine.value()).toBe('héllo €');
  });

  it('rejects bytes that are invalid in the declared encoding', () => {
    const bytes = Buffer.concat([Buffer.from('<r>'), Buffer.from([0xff]), Buffer.from('</r>')]);
    const { engine } = engineOver(bytes);
    expect(engine.read()).toBe(-1);
    expect(getLastError()?.domain).toBe(XmlErrorDomain.I18N);
    expect(getLastError()?.code).toBe(XmlErrorCode.InvalidEncoding);
  });

  it('rejects a declaration that contradicts the decoder', () => {
    const { engine } = engineOver('<?xml version="1.0" encoding="ISO-8859-1"?><r/>');
    expect(engine.read()).toBe(-1);
    expect(getLastError()?.code).toBe(XmlErrorCode.EncodingMismatch);
    expect(getLastError()?.details).toBe('ISO-8859-1');
  });

  it('sniffs UTF-16 from the byte order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('<r>hi</r>', 'utf16le')]);
    const { engine } = engineOver(bytes, { encoding: 'none' });
    expect(engine.read()).toBe(1);
    expect(engine.name()).toBe('r');
    engine.read();
    expect(engine.value()).toBe('hi');
  });

  it('decodes latin1 input', () => {
    const { engine } = engineOver(Buffer.from('<r>café</r>', 'latin1'), { encoding: 'latin1' });
    engine.read();
    engine.read();
    expect(engine.value()).toBe('café');
  });

  it('reports comments, CDATA and processing instructions', () => {
    const { engine } = engineOver('<r><!--note--><![CDATA[a<b]]><?pi data?></r>');
    engine.read();
    expect(engine.read()).toBe(1);
    expect([engine.nodeType(), engine.value()]).toEqual([NodeType.Comment, 'note']);
    engine.read();
    expect([engine.nodeType(), engine.value()]).toEqual([NodeType.CDATA, 'a<b']);
    engine.read();
    expect([engine.nodeType(), engine.name(), engine.value()]).toEqual([NodeType.ProcessingInstruction, 'pi', 'data']);
  });

  it('closes the transport exactly once', () => {
    const { input, engine } = engineOver('<r/>');
    expect(engine.free()).toBe(0);
    expect(engine.free()).toBe(0);
    expect(input.closeCalls).toBe(1);
  });

  it('reports a failing close callback', () => {
    const transport: InputTransport<null> = { context: null, read: () => 0, close: () => -1 };
    const engine = new TextReaderEngine(transport, { encoding: 'utf-8', chunkSize: 16 });
    expect(engine.free()).toBe(-1);
    expect(getLastError()?.code).toBe(XmlErrorCode.IoCloseFailed);
  });
});
