/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Streaming XML text writer. Output is buffered and pushed through an
  OutputTransport; every operation returns the number of bytes it produced
  or -1 after reporting a structured error.
*/

import { TextEncoder } from 'util';
import { escapeAttribute, escapeText, isValidName } from './escape';
import { raiseError, XmlErrorCode, XmlErrorDomain, XmlErrorFlags, XmlErrorLevel } from './error-record';
import type { StructuredErrorHandler, XmlErrorRecord } from './error-record';
import type { OutputTransport } from './transport';

export interface TextWriterEngineOptions {
  /** Flush threshold for buffered output, in characters. */
  bufferSize: number;
  onError?: StructuredErrorHandler;
}

interface Frame {
  name: string;
  /** Start tag still open, attributes may follow. */
  open: boolean;
  attributes: Set<string>;
  hasText: boolean;
  hasChildren: boolean;
}

type DocumentState = 'none' | 'started' | 'ended';

const encoder = new TextEncoder();

export class TextWriterEngine<C> {
  private readonly transport: OutputTransport<C>;
  private readonly options: TextWriterEngineOptions;
  private readonly stack: Frame[] = [];
  private pending = '';
  private documentState: DocumentState = 'none';
  private indentWidth = 0;
  /** Top-level elements started so far; a document has exactly one. */
  private roots = 0;
  private failed = false;
  private closed = false;

  constructor(transport: OutputTransport<C>, options: TextWriterEngineOptions) {
    this.transport = transport;
    this.options = options;
  }

  get openElements(): number {
    return this.stack.length;
  }

  /** 0 disables indentation, n indents every nesting level by n spaces. */
  setIndent(width: number): number {
    this.indentWidth = Math.max(0, Math.floor(width));
    return 0;
  }

  startDocument(version: string, encoding: string, standalone: string | null): number {
    if (this.failed) return -1;
    if (this.documentState !== 'none') {
      return this.fail(XmlErrorCode.WriterInvalidState, 'Document already started');
    }
    if (this.roots > 0) {
      return this.fail(XmlErrorCode.WriterInvalidState, 'XML declaration after the first element');
    }
    if (!/^utf-?8$/i.test(encoding)) {
      return this.fail(XmlErrorCode.UnsupportedEncoding, `Unsupported output encoding ${encoding}`, encoding);
    }
    this.documentState = 'started';
    let decl = `<?xml version="${escapeAttribute(version)}" encoding="${escapeAttribute(encoding)}"`;
    if (standalone !== null) decl += ` standalone="${escapeAttribute(standalone)}"`;
    return this.emit(decl + '?>\n');
  }

  endDocument(): number {
    if (this.failed) return -1;
    if (this.documentState !== 'started') {
      return this.fail(XmlErrorCode.WriterInvalidState, 'No document to end');
    }
    let count = 0;
    while (this.stack.length > 0) {
      const result = this.endElement();
      if (result < 0) return result;
      count += result;
    }
    this.documentState = 'ended';
    const result = this.emit('\n');
    if (result < 0) return result;
    if (this.flush() < 0) return -1;
    return count + result;
  }

  startElement(name: string): number {
    if (this.failed) return -1;
    if (this.documentState === 'ended') {
      return this.fail(XmlErrorCode.WriterInvalidState, `Element <${name}> after end of document`, name);
    }
    if (!isValidName(name)) {
      return this.fail(XmlErrorCode.WriterInvalidName, `Invalid element name "${name}"`, name);
    }
    if (this.stack.length === 0 && this.roots > 0) {
      return this.fail(XmlErrorCode.WriterInvalidState, `Second root element <${name}>`, name);
    }
    let out = '';
    const parent = this.stack[this.stack.length - 1];
    if (parent) {
      out += this.closeStartTag(parent);
      parent.hasChildren = true;
      if (this.indentWidth > 0 && !parent.hasText) out += '\n' + this.indentation(this.stack.length);
    }
    if (!parent) this.roots++;
    this.stack.push({ name, open: true, attributes: new Set(), hasText: false, hasChildren: false });
    return this.emit(out + '<' + name);
  }

  endElement(): number {
    if (this.failed) return -1;
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      return this.fail(XmlErrorCode.WriterInvalidState, 'No open element to end');
    }
    let out: string;
    if (frame.open) {
      out = '/>';
    } else {
      out = '';
      if (this.indentWidth > 0 && frame.hasChildren && !frame.hasText) {
        out += '\n' + this.indentation(this.stack.length - 1);
      }
      out += `</${frame.name}>`;
    }
    this.stack.pop();
    return this.emit(out);
  }

  writeAttribute(name: string, value: string): number {
    if (this.failed) return -1;
    const frame = this.stack[this.stack.length - 1];
    if (!frame || !frame.open) {
      return this.fail(
        XmlErrorCode.WriterAttributeOutOfPlace,
        `Attribute "${name}" must directly follow a start element`,
        name
      );
    }
    if (!isValidName(name)) {
      return this.fail(XmlErrorCode.WriterInvalidName, `Invalid attribute name "${name}"`, name);
    }
    if (frame.attributes.has(name)) {
      return this.fail(XmlErrorCode.WriterDuplicateAttribute, `Duplicate attribute "${name}" on <${frame.name}>`, name);
    }
    frame.attributes.add(name);
    return this.emit(` ${name}="${escapeAttribute(value)}"`);
  }

  writeString(text: string): number {
    return this.writeContent(escapeText(text));
  }

  writeBase64(bytes: Uint8Array): number {
    return this.writeContent(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64'));
  }

  private writeContent(content: string): number {
    if (this.failed) return -1;
    const frame = this.stack[this.stack.length - 1];
    if (!frame) {
      return this.fail(XmlErrorCode.WriterInvalidState, 'Text content outside of an element');
    }
    const out = this.closeStartTag(frame) + content;
    frame.hasText = true;
    return this.emit(out);
  }

  private closeStartTag(frame: Frame): string {
    if (!frame.open) return '';
    frame.open = false;
    return '>';
  }

  private indentation(depth: number): string {
    return ' '.repeat(this.indentWidth * depth);
  }

  private emit(text: string): number {
    this.pending += text;
    if (this.pending.length >= this.options.bufferSize && this.flush() < 0) return -1;
    return Buffer.byteLength(text, 'utf8');
  }

  /** Push buffered output through the transport. Returns bytes written. */
  flush(): number {
    if (this.failed) return -1;
    if (this.pending.length === 0) return 0;
    let bytes: Uint8Array;
    try {
      bytes = encoder.encode(this.pending);
    } catch (err) {
      if (err instanceof RangeError) {
        return this.fail(XmlErrorCode.NoMemory, err.message, undefined, XmlErrorDomain.Memory);
      }
      throw err;
    }
    this.pending = '';
    const written = this.transport.write(this.transport.context, bytes, bytes.length);
    if (written < 0) {
      return this.fail(XmlErrorCode.IoWriteFailed, 'Output write callback failed', undefined, XmlErrorDomain.IO, XmlErrorFlags.FromCallback);
    }
    if (written !== bytes.length) {
      return this.fail(
        XmlErrorCode.IoShortWrite,
        `Output accepted ${written} of ${bytes.length} bytes`,
        undefined,
        XmlErrorDomain.IO,
        XmlErrorFlags.FromCallback
      );
    }
    return written;
  }

  private fail(
    code: XmlErrorCode,
    message: string,
    details?: string,
    domain: XmlErrorRecord['domain'] = XmlErrorDomain.Writer,
    flags: number = XmlErrorFlags.None
  ): number {
    this.failed = true;
    raiseError(this.options.onError, { domain, code, level: XmlErrorLevel.Error, message, details, flags });
    return -1;
  }

  /**
   * Release the output without flushing. The transport's close callback runs
   * exactly once. Returns the close status.
   */
  free(): number {
    if (this.closed) return 0;
    this.closed = true;
    this.pending = '';
    const result = this.transport.close(this.transport.context);
    if (result !== 0) {
      raiseError(this.options.onError, {
        domain: XmlErrorDomain.IO,
        code: XmlErrorCode.IoCloseFailed,
        message: 'Output close callback failed',
        flags: XmlErrorFlags.FromCallback,
      });
      return -1;
    }
    return 0;
  }
}
