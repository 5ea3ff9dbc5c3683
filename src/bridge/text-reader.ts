/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { DEFAULT_ENCODING, resolveReaderOptions } from '../config';
import type { ReaderOptions } from '../config';
import type { CharEncoding } from '../engine/encoding';
import type { XmlErrorRecord } from '../engine/error-record';
import { isTextual, NodeType, nodeTypeToString } from '../engine/node-types';
import { TextReaderEngine } from '../engine/text-reader';
import { LogicError, ParseError } from './errors';
import { PendingException } from './pending-exception';
import { XmlError, XmlException } from './structured-error';

/**
 * Byte source consumed by the reader. The caller keeps ownership and must
 * keep it alive until the reader is closed.
 */
export interface Input {
  /**
   * Fill `buffer` with up to `maxLen` bytes. Returns the count, 0 at end of
   * input or a negative value on failure. May throw.
   */
  read(buffer: Uint8Array, maxLen: number): number;
  /** No read() follows. */
  close(): void;
}

/**
 * Pull reader over an Input with a traversal API for documents of a known
 * shape. Errors thrown by the Input are rethrown unchanged; malformed input
 * raises XmlException. After either, only close() and dispose() are allowed.
 */
export class InputBufferTextReader {
  private readonly input: Input;
  private readonly engine: TextReaderEngine<InputBufferTextReader>;
  private readonly logger: Logger;
  private readonly verboseErrors: boolean;
  protected readonly pending = new PendingException();
  private engineError: XmlError | undefined;
  private poisoned = false;
  private released = false;

  constructor(input: Input, encoding: CharEncoding = DEFAULT_ENCODING, options: ReaderOptions = {}) {
    const config = resolveReaderOptions(options);
    this.input = input;
    this.logger = config.logger;
    this.logger.setContext('xml-reader');
    this.verboseErrors = config.verboseErrors;
    this.engine = new TextReaderEngine<InputBufferTextReader>(
      { context: this, read: InputBufferTextReader.inputRead, close: InputBufferTextReader.inputClose },
      {
        encoding,
        chunkSize: config.chunkSize,
        file: config.file,
        onError: (error) => this.onEngineError(error),
      }
    );
    this.logger.debug('reader created', { encoding, chunkSize: config.chunkSize });
  }

  private static inputRead(reader: InputBufferTextReader, buffer: Uint8Array, len: number): number {
    return reader.pending.guard(() => {
      const count = reader.input.read(buffer, len);
      if (count > len) {
        throw new LogicError(`Input.read() returned ${count} bytes for a ${len} byte request`);
      }
      return count;
    }, -1);
  }

  private static inputClose(reader: InputBufferTextReader): number {
    return reader.pending.guard(() => {
      reader.input.close();
      return 0;
    }, -1);
  }

  private onEngineError(error: Readonly<XmlErrorRecord>): void {
    // the captured input error is the root cause; the engine's follow-up is noise
    if (this.pending.isSet || this.engineError) return;
    this.engineError = XmlError.copy(error);
  }

  private assertUsable(): void {
    if (this.released) throw new LogicError('Reader is closed');
    if (this.pending.isSet) throw new LogicError('Reader has an unreported input error');
    if (this.poisoned) throw new LogicError('Reader cannot be used after a failure');
  }

  private drive(operation: () => number): number {
    this.assertUsable();
    this.engineError = undefined;
    const result = operation();
    this.checkException(result);
    return result;
  }

  private checkException(result: number): void {
    if (this.pending.isSet) {
      this.poisoned = true;
      this.pending.rethrow();
    }
    if (result < 0) {
      this.poisoned = true;
      throw this.engineError
        ? XmlException.from(this.engineError, this.verboseErrors)
        : XmlException.lastError(this.verboseErrors);
    }
  }

  /** Advance to the next node. False at end of document. */
  read(): boolean {
    return this.drive(() => this.engine.read()) === 1;
  }

  expectRead(): void {
    if (!this.read()) throw new ParseError('Unexpected end of document', this.lineNumber(), this.columnNumber());
  }

  /** Advance to the next node after the current subtree. False at end of document. */
  next(): boolean {
    return this.drive(() => this.engine.next()) === 1;
  }

  expectNext(): void {
    if (!this.next()) throw new ParseError('Unexpected end of document', this.lineNumber(), this.columnNumber());
  }

  /** Require a start element with the given local name. Does not move the cursor. */
  expectLocalNameElement(localName: string): void {
    const type = this.nodeType();
    if (type !== NodeType.Element) {
      throw new ParseError(
        `Expected element <${localName}> but found ${nodeTypeToString(type)} node`,
        this.lineNumber(),
        this.columnNumber()
      );
    }
    const found = this.localName();
    if (found !== localName) {
      throw new ParseError(
        `Expected element <${localName}> but found <${found}>`,
        this.lineNumber(),
        this.columnNumber()
      );
    }
  }

  /** Value of an attribute of the current start element, undefined when absent. */
  attribute(name: string): string | undefined {
    this.assertElement('attribute()');
    return this.engine.getAttribute(name);
  }

  attributeNames(): string[] {
    this.assertElement('attributeNames()');
    return this.engine.attributeNames();
  }

  /**
   * Text content of the current node. On a start element every descendant
   * text and CDATA node is concatenated and the cursor ends on the matching
   * end element; an empty element yields '' and the cursor stays.
   */
  readString(): string {
    const type = this.nodeType();
    if (isTextual(type)) return this.engine.value();
    if (type !== NodeType.Element) {
      throw new LogicError(`readString() on ${nodeTypeToString(type)} node`);
    }
    if (this.isEmpty()) return '';
    const depth = this.depth();
    let text = '';
    for (;;) {
      this.expectRead();
      const current = this.nodeType();
      if (current === NodeType.EndElement && this.depth() === depth) return text;
      if (isTextual(current)) text += this.engine.value();
    }
  }

  private assertElement(operation: string): void {
    const type = this.nodeType();
    if (type !== NodeType.Element) {
      throw new LogicError(`${operation} on ${nodeTypeToString(type)} node`);
    }
  }

  lineNumber(): number {
    return this.engine.lineNumber();
  }

  columnNumber(): number {
    return this.engine.columnNumber();
  }

  isEmpty(): boolean {
    return this.engine.isEmptyElement();
  }

  depth(): number {
    return this.engine.depth();
  }

  localName(): string {
    return this.engine.localName();
  }

  /** Qualified name as written in the document. */
  name(): string {
    return this.engine.name();
  }

  prefix(): string {
    return this.engine.prefix();
  }

  value(): string {
    return this.engine.value();
  }

  nodeType(): NodeType {
    return this.engine.nodeType();
  }

  /** Whether a failure has surfaced; the reader is then only good for closing. */
  get failed(): boolean {
    return this.poisoned || this.pending.isSet;
  }

  /**
   * Close the input. Rethrows a close failure unless the reader already
   * failed, in which case the first error stands and this one is logged.
   */
  close(): void {
    this.release(!this.failed);
  }

  /** Close the input without throwing. Safe in finally blocks. */
  dispose(): void {
    this.release(false);
  }

  private release(rethrow: boolean): void {
    if (this.released) return;
    this.released = true;
    this.engineError = undefined;
    const result = this.engine.free();
    this.logger.debug('reader closed');
    if (rethrow) {
      this.checkException(result);
      return;
    }
    try {
      this.checkException(result);
    } catch (error) {
      this.logger.warn('input close failed during teardown', error);
    }
  }
}
