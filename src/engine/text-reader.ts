/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Pull-style token cursor over a sax push parser. Bytes are pulled through an
  InputTransport; failures surface only as a -1 return plus a structured
  error (handler + last-error slot).
*/

import * as sax from 'sax';
import { TextDecoder } from 'util';
import { NodeType } from './node-types';
import { checkDeclaredEncoding, detectEncoding, SNIFF_LENGTH } from './encoding';
import type { CharEncoding, ResolvedEncoding } from './encoding';
import { raiseError, XmlErrorCode, XmlErrorDomain, XmlErrorFlags, XmlErrorLevel } from './error-record';
import type { StructuredErrorHandler, XmlErrorRecord } from './error-record';
import type { InputTransport } from './transport';

export interface TextReaderEngineOptions {
  encoding: CharEncoding;
  /** Bytes requested from the transport per read callback. */
  chunkSize: number;
  onError?: StructuredErrorHandler;
  /** Source name reported in error records. */
  file?: string;
}

interface Token {
  type: NodeType;
  /** Qualified name; '#text', '#comment', ... for character nodes. */
  name: string;
  value: string;
  depth: number;
  isEmpty: boolean;
  attributes: ReadonlyMap<string, string>;
  line: number;
  column: number;
}

type PendingError = Pick<XmlErrorRecord, 'domain' | 'code' | 'level' | 'message' | 'line' | 'column' | 'flags'> & {
  details?: string;
};

type Status = 'reading' | 'eof' | 'error';

const SAX_ERROR_CODES: Array<[string, XmlErrorCode]> = [
  ['Unexpected close tag', XmlErrorCode.TagNameMismatch],
  ['Unmatched closing tag', XmlErrorCode.TagNameMismatch],
  ['Unclosed root tag', XmlErrorCode.TagNotFinished],
  ['Unexpected end', XmlErrorCode.TagNotFinished],
  ['Text data outside of root node', XmlErrorCode.DocumentEnd],
  ['Non-whitespace before first tag', XmlErrorCode.DocumentStart],
  ['Invalid character entity', XmlErrorCode.EntityRef],
];

function saxErrorCode(message: string): XmlErrorCode {
  for (const [prefix, code] of SAX_ERROR_CODES) {
    if (message.startsWith(prefix)) return code;
  }
  return XmlErrorCode.NotWellFormed;
}

function localPart(name: string): string {
  const colonIdx = name.indexOf(':');
  return colonIdx >= 0 ? name.slice(colonIdx + 1) : name;
}

export class TextReaderEngine<C> {
  private readonly transport: InputTransport<C>;
  private readonly options: TextReaderEngineOptions;
  private readonly parser: sax.SAXParser;
  private readonly queue: Token[] = [];
  private readonly stack: Array<{ name: string; selfClosing: boolean }> = [];
  /** Attributes of the start tag being parsed, in document order. */
  private tagAttributes = new Map<string, string>();
  private current: Token | undefined;
  private status: Status = 'reading';
  private inputDone = false;
  private sawRoot = false;
  /** Set once a parse error is recorded; later sax events are dropped. */
  private halted = false;
  private deferred: PendingError | undefined;
  private decoder: TextDecoder | undefined;
  private activeEncoding: ResolvedEncoding | undefined;
  private sniffed: Uint8Array = new Uint8Array(0);
  private closed = false;
  private lastLine = 1;
  private lastColumn = 0;

  constructor(transport: InputTransport<C>, options: TextReaderEngineOptions) {
    this.transport = transport;
    this.options = options;
    this.parser = sax.parser(true, { trim: false, normalize: false, position: true });
    this.registerHandlers();
  }

  private registerHandlers(): void {
    const parser = this.parser;

    parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
      if (this.halted) return;
      this.sawRoot = true;
      const token = this.token(NodeType.Element, tag.name, '');
      token.isEmpty = tag.isSelfClosing;
      token.attributes = this.tagAttributes;
      this.tagAttributes = new Map();
      this.stack.push({ name: tag.name, selfClosing: tag.isSelfClosing });
      this.queue.push(token);
    };

    // sax's own attribute object is a plain object and loses names such as __proto__
    parser.onattribute = (attribute: { name: string; value: string }) => {
      if (this.halted) return;
      this.tagAttributes.set(attribute.name, attribute.value);
    };

    parser.onclosetag = () => {
      if (this.halted) return;
      const frame = this.stack.pop();
      // self-closing elements were already reported as one empty element
      if (!frame || frame.selfClosing) return;
      this.queue.push(this.token(NodeType.EndElement, frame.name, ''));
    };

    parser.ontext = (text: string) => {
      if (this.halted || this.stack.length === 0) return;
      const type = /^\s*$/.test(text) ? NodeType.SignificantWhitespace : NodeType.Text;
      this.queue.push(this.token(type, '#text', text));
    };

    parser.oncdata = (text: string) => {
      if (this.halted) return;
      this.queue.push(this.token(NodeType.CDATA, '#cdata-section', text));
    };

    parser.oncomment = (text: string) => {
      if (this.halted) return;
      this.queue.push(this.token(NodeType.Comment, '#comment', text));
    };

    parser.ondoctype = (doctype: string) => {
      if (this.halted) return;
      const name = doctype.trim().split(/\s+/)[0] ?? '';
      this.queue.push(this.token(NodeType.DocumentType, name, doctype));
    };

    parser.onprocessinginstruction = (node: { name: string; body: string }) => {
      if (this.halted) return;
      if (node.name === 'xml') {
        this.checkDeclaration(node.body);
        return;
      }
      this.queue.push(this.token(NodeType.ProcessingInstruction, node.name, node.body));
    };

    parser.onerror = (err: Error) => {
      if (this.halted) return;
      const message = err.message.split('\n')[0] ?? err.message;
      this.defer({
        domain: XmlErrorDomain.Parser,
        code: saxErrorCode(message),
        level: XmlErrorLevel.Fatal,
        message,
      });
    };
  }

  private token(type: NodeType, name: string, value: string): Token {
    return {
      type,
      name,
      value,
      depth: this.stack.length,
      isEmpty: false,
      attributes: new Map(),
      line: this.parser.line + 1,
      column: this.parser.column,
    };
  }

  private checkDeclaration(body: string): void {
    const match = /encoding\s*=\s*["']([^"']*)["']/.exec(body);
    const declared = match?.[1];
    if (declared === undefined || this.activeEncoding === undefined) return;
    const problem = checkDeclaredEncoding(declared, this.activeEncoding);
    if (problem === 'unsupported') {
      this.defer({
        domain: XmlErrorDomain.I18N,
        code: XmlErrorCode.UnsupportedEncoding,
        level: XmlErrorLevel.Fatal,
        message: `Unsupported encoding ${declared}`,
        details: declared,
      });
    } else if (problem === 'mismatch') {
      this.defer({
        domain: XmlErrorDomain.I18N,
        code: XmlErrorCode.EncodingMismatch,
        level: XmlErrorLevel.Fatal,
        message: `Document declares encoding ${declared} but input is decoded as ${this.activeEncoding}`,
        details: declared,
      });
    }
  }

  private defer(
    error: Omit<PendingError, 'line' | 'column' | 'flags'> & Partial<Pick<PendingError, 'flags'>>
  ): void {
    this.halted = true;
    this.deferred ??= {
      flags: XmlErrorFlags.None,
      ...error,
      line: this.parser.line + 1,
      column: this.parser.column,
    };
  }

  private fail(error: Omit<PendingError, 'line' | 'column'> & Partial<Pick<PendingError, 'line' | 'column'>>): number {
    this.status = 'error';
    this.current = undefined;
    raiseError(this.options.onError, {
      line: this.parser.line + 1,
      column: this.parser.column,
      file: this.options.file,
      ...error,
    });
    return -1;
  }

  /**
   * Advance to the next node. Returns 1 when positioned on a node, 0 at end
   * of input and -1 on failure.
   */
  read(): number {
    if (this.status === 'error') return -1;
    if (this.status === 'eof') return 0;
    while (this.queue.length === 0) {
      if (this.deferred) return this.fail(this.deferred);
      if (this.inputDone) {
        this.status = 'eof';
        this.current = undefined;
        return 0;
      }
      if (this.fill() < 0) return -1;
    }
    const node = this.queue.shift();
    this.current = node;
    if (node) {
      this.lastLine = node.line;
      this.lastColumn = node.column;
    }
    return 1;
  }

  /** Advance past the subtree of the current node. Same returns as read(). */
  next(): number {
    const node = this.current;
    if (node && node.type === NodeType.Element && !node.isEmpty) {
      for (;;) {
        const result = this.read();
        if (result !== 1) return result;
        const cur = this.current;
        if (cur && cur.type === NodeType.EndElement && cur.depth === node.depth) break;
      }
    }
    return this.read();
  }

  private fill(): number {
    const len = this.options.chunkSize;
    const buffer = new Uint8Array(len);
    const count = this.transport.read(this.transport.context, buffer, len);
    if (!Number.isInteger(count) || count < 0) {
      return this.fail({
        domain: XmlErrorDomain.IO,
        code: XmlErrorCode.IoReadFailed,
        level: XmlErrorLevel.Fatal,
        message: count < 0 ? 'Input read callback failed' : `Input read callback returned ${count}`,
        flags: XmlErrorFlags.FromCallback,
      });
    }
    if (count > len) {
      return this.fail({
        domain: XmlErrorDomain.IO,
        code: XmlErrorCode.InternalError,
        level: XmlErrorLevel.Fatal,
        message: `Input read callback returned ${count} bytes for a ${len} byte buffer`,
        flags: XmlErrorFlags.FromCallback,
      });
    }
    if (count === 0) {
      this.finish();
      return 0;
    }
    this.feed(buffer.subarray(0, count), false);
    return count;
  }

  private feed(bytes: Uint8Array, final: boolean): void {
    try {
      const text = this.decode(bytes, final);
      if (text && !this.halted) this.parser.write(text);
    } catch (err) {
      this.deferFailure(err);
    }
  }

  private deferFailure(err: unknown): void {
    if (this.activeEncoding !== undefined && !this.decoder) {
      this.defer({
        domain: XmlErrorDomain.I18N,
        code: XmlErrorCode.UnsupportedEncoding,
        level: XmlErrorLevel.Fatal,
        message: `Unsupported encoding ${this.activeEncoding}`,
        details: this.activeEncoding,
      });
    } else if (err instanceof RangeError) {
      this.defer({
        domain: XmlErrorDomain.Memory,
        code: XmlErrorCode.NoMemory,
        level: XmlErrorLevel.Fatal,
        message: err.message,
      });
    } else if (err instanceof TypeError && this.decoder) {
      // TextDecoder with fatal: true rejects malformed byte sequences this way
      this.defer({
        domain: XmlErrorDomain.I18N,
        code: XmlErrorCode.InvalidEncoding,
        level: XmlErrorLevel.Fatal,
        message: `Input is not valid ${this.activeEncoding ?? 'encoded'} data`,
        details: this.activeEncoding,
      });
    } else {
      this.defer({
        domain: XmlErrorDomain.Parser,
        code: XmlErrorCode.InternalError,
        level: XmlErrorLevel.Fatal,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private decode(bytes: Uint8Array, final: boolean): string {
    if (!this.decoder) {
      if (this.options.encoding === 'none') {
        const joined = new Uint8Array(this.sniffed.length + bytes.length);
        joined.set(this.sniffed, 0);
        joined.set(bytes, this.sniffed.length);
        if (joined.length < SNIFF_LENGTH && !final) {
          this.sniffed = joined;
          return '';
        }
        this.sniffed = new Uint8Array(0);
        this.activeEncoding = detectEncoding(joined);
        bytes = joined;
      } else {
        this.activeEncoding = this.options.encoding;
      }
      this.decoder = new TextDecoder(this.activeEncoding, { fatal: true });
    }
    return this.decoder.decode(bytes, { stream: !final });
  }

  private finish(): void {
    this.inputDone = true;
    if (!this.halted) this.feed(new Uint8Array(0), true);
    if (!this.halted) {
      try {
        this.parser.close();
      } catch (err) {
        this.deferFailure(err);
      }
    }
    if (!this.halted && !this.sawRoot) {
      this.defer({
        domain: XmlErrorDomain.Parser,
        code: XmlErrorCode.DocumentEmpty,
        level: XmlErrorLevel.Fatal,
        message: 'Document is empty',
        flags: XmlErrorFlags.AtEndOfInput,
      });
    }
  }

  nodeType(): NodeType {
    return this.current?.type ?? NodeType.None;
  }

  /** Nesting depth of the current node, -1 when there is none. */
  depth(): number {
    return this.current?.depth ?? -1;
  }

  isEmptyElement(): boolean {
    return this.current?.isEmpty ?? false;
  }

  name(): string {
    return this.current?.name ?? '';
  }

  localName(): string {
    const node = this.current;
    if (!node) return '';
    return node.type === NodeType.Element || node.type === NodeType.EndElement ? localPart(node.name) : node.name;
  }

  prefix(): string {
    const name = this.current?.name ?? '';
    const colonIdx = name.indexOf(':');
    return colonIdx >= 0 ? name.slice(0, colonIdx) : '';
  }

  value(): string {
    return this.current?.value ?? '';
  }

  getAttribute(name: string): string | undefined {
    return this.current?.attributes.get(name);
  }

  attributeNames(): string[] {
    return [...(this.current?.attributes.keys() ?? [])];
  }

  lineNumber(): number {
    return this.current?.line ?? this.lastLine;
  }

  columnNumber(): number {
    return this.current?.column ?? this.lastColumn;
  }

  /**
   * Release the input. The transport's close callback runs exactly once,
   * no matter how often free() is called. Returns the close status.
   */
  free(): number {
    if (this.closed) return 0;
    this.closed = true;
    this.queue.length = 0;
    this.current = undefined;
    const result = this.transport.close(this.transport.context);
    if (result !== 0) {
      raiseError(this.options.onError, {
        domain: XmlErrorDomain.IO,
        code: XmlErrorCode.IoCloseFailed,
        message: 'Input close callback failed',
        flags: XmlErrorFlags.FromCallback,
        file: this.options.file,
      });
      return -1;
    }
    return 0;
  }
}
