/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { describe, it, expect } from 'vitest';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MemoryLogger } from '../common/memory-logger';
import { NodeType } from '../engine/node-types';
import { BufferInput } from '../io/buffer-input';
import { BufferOutput } from '../io/buffer-output';
import { InputBufferTextReader } from './text-reader';
import { OutputBufferTextWriter } from './text-writer';

function writeDatabase(writer: OutputBufferTextWriter): void {
  writer.writeStartDocument();
  writer.withElement('Database', () => {
    writer.writeAttribute('version', '4');
    writer.withElement('Meta', () => {
      writer.withElement('Name', () => writer.writeString('Vault & Co'));
    });
    writer.withElement('Group', () => {
      for (const [uuid, title] of [
        ['e1', 'mail <work>'],
        ['e2', 'bank "main"'],
      ]) {
        writer.withElement('Entry', () => {
          writer.writeAttribute('UUID', uuid);
          writer.withElement('Title', () => writer.writeString(title));
          writer.withElement('Icon', () => writer.writeBase64(new Uint8Array([0, 255, 16])));
        });
      }
      writer.element('Empty').close();
    });
  });
  writer.writeEndDocument();
}

function copyDocument(reader: InputBufferTextReader, writer: OutputBufferTextWriter): void {
  writer.writeStartDocument();
  while (reader.read()) {
    switch (reader.nodeType()) {
      case NodeType.Element: {
        const empty = reader.isEmpty();
        writer.writeStartElement(reader.name());
        for (const name of reader.attributeNames()) {
          writer.writeAttribute(name, reader.attribute(name) ?? '');
        }
        if (empty) writer.writeEndElement();
        break;
      }
      case NodeType.EndElement:
        writer.writeEndElement();
        break;
      case NodeType.Text:
      case NodeType.CDATA:
        writer.writeString(reader.value());
        break;
    }
  }
  writer.writeEndDocument();
}

describe('reader and writer round trip', () => {
  const parser = new XMLParser({ ignoreAttributes: false });

  it('writes well-formed XML', () => {
    const output = new BufferOutput();
    const writer = new OutputBufferTextWriter(output, { logger: new MemoryLogger(), bufferSize: 16, indent: 2 });
    writeDatabase(writer);
    writer.close();

    const text = output.toString();
    expect(XMLValidator.validate(text)).toBe(true);
    const parsed = parser.parse(text);
    expect(parsed.Database['@_version']).toBe('4');
    expect(parsed.Database.Meta.Name).toBe('Vault & Co');
    expect(parsed.Database.Group.Entry[0].Title).toBe('mail <work>');
    expect(parsed.Database.Group.Entry[1]['@_UUID']).toBe('e2');
    expect(parsed.Database.Group.Entry[1].Icon).toBe('AP8Q');
  });

  it('reproduces a document read back through the reader', () => {
    const source = new BufferOutput();
    const sourceWriter = new OutputBufferTextWriter(source, { logger: new MemoryLogger() });
    writeDatabase(sourceWriter);
    sourceWriter.close();

    const input = new BufferInput(source.toBuffer());
    const reader = new InputBufferTextReader(input, 'none', { logger: new MemoryLogger(), chunkSize: 7 });
    const copy = new BufferOutput();
    const copyWriter = new OutputBufferTextWriter(copy, { logger: new MemoryLogger() });
    try {
      copyDocument(reader, copyWriter);
      copyWriter.close();
    } finally {
      reader.dispose();
      copyWriter.dispose();
    }

    expect(copy.toString()).toBe(source.toString());
    expect(parser.parse(copy.toString())).toEqual(parser.parse(source.toString()));
    expect(input.closeCalls).toBe(1);
    expect(copy.closeCalls).toBe(1);
  });
});
