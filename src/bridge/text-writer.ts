/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger } from '../common/logger';
import { DEFAULT_DOCUMENT, resolveWriterOptions } from '../config';
import type { WriterOptions } from '../config';
import type { XmlErrorRecord } from '../engine/error-record';
import { TextWriterEngine } from '../engine/text-writer';
import { LogicError } from './errors';
import { PendingException } from './pending-exception';
import { XmlError, XmlException } from './structured-error';

/**
 * Byte sink fed by the writer. The caller keeps ownership and must keep it
 * alive until the writer is closed.
 */
export interface Output {
  /** Consume `len` bytes of `buffer`. Returns the count accepted, negative on failure. May throw. */
  write(buffer: Uint8Array, len: number): number;
  close(): void;
}

/**
 * Streaming XML writer over an Output. Errors thrown by the Output are
 * rethrown unchanged; invalid write sequences raise XmlException. After
 * either, only close() and dispose() are allowed.
 */
export class OutputBufferTextWriter {
  private readonly output: Output;
  private readonly engine: TextWriterEngine<OutputBufferTextWriter>;
  private readonly logger: Logger;
  private readonly verboseErrors: boolean;
  protected readonly pending = new PendingException();
  private engineError: XmlError | undefined;
  private poisoned = false;
  private released = false;

  constructor(output: Output, options: WriterOptions = {}) {
    const config = resolveWriterOptions(options);
    this.output = output;
    this.logger = config.logger;
    this.logger.setContext('xml-writer');
    this.verboseErrors = config.verboseErrors;
    this.engine = new TextWriterEngine<OutputBufferTextWriter>(
      { context: this, write: OutputBufferTextWriter.outputWrite, close: OutputBufferTextWriter.outputClose },
      { bufferSize: config.bufferSize, onError: (error) => this.onEngineError(error) }
    );
    this.engine.setIndent(config.indent);
    this.logger.debug('writer created', { bufferSize: config.bufferSize, indent: config.indent });
  }

  private static outputWrite(writer: OutputBufferTextWriter, buffer: Uint8Array, len: number): number {
    return writer.pending.guard(() => writer.output.write(buffer, len), -1);
  }

  private static outputClose(writer: OutputBufferTextWriter): number {
    return writer.pending.guard(() => {
      writer.output.close();
      return 0;
    }, -1);
  }

  private onEngineError(error: Readonly<XmlErrorRecord>): void {
    if (this.pending.isSet || this.engineError) return;
    this.engineError = XmlError.copy(error);
  }

  private assertUsable(): void {
    if (this.released) throw new LogicError('Writer is closed');
    if (this.pending.isSet) throw new LogicError('Writer has an unreported output error');
    if (this.poisoned) throw new LogicError('Writer cannot be used after a failure');
  }

  private drive(operation: () => number): void {
    this.assertUsable();
    this.engineError = undefined;
    this.checkException(operation());
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

  /** 0 turns indentation off; n indents each nesting level by n spaces. */
  setIndent(width: number): void {
    this.drive(() => this.engine.setIndent(width));
  }

  /** Pass `null` as standalone to leave it out of the declaration. */
  writeStartDocument(
    version: string = DEFAULT_DOCUMENT.version,
    encoding: string = DEFAULT_DOCUMENT.encoding,
    standalone: string | null = DEFAULT_DOCUMENT.standalone
  ): void {
    this.drive(() => this.engine.startDocument(version, encoding, standalone));
  }

  /** Close every open element, end the document and flush. */
  writeEndDocument(): void {
    this.drive(() => this.engine.endDocument());
  }

  writeStartElement(name: string): void {
    this.drive(() => this.engine.startElement(name));
  }

  writeEndElement(): void {
    this.assertUsable();
    if (this.engine.openElements === 0) throw new LogicError('writeEndElement() without an open element');
    this.drive(() => this.engine.endElement());
  }

  writeAttribute(name: string, value: string): void {
    this.drive(() => this.engine.writeAttribute(name, value));
  }

  writeString(text: string): void {
    this.drive(() => this.engine.writeString(text));
  }

  writeBase64(bytes: Uint8Array): void {
    this.drive(() => this.engine.writeBase64(bytes));
  }

  flush(): void {
    this.drive(() => this.engine.flush());
  }

  /** Open an element that an ElementGuard will close. */
  element(name: string): ElementGuard {
    return new ElementGuard(this, name);
  }

  /**
   * Write an element around `body`. The end tag follows a normal return;
   * when `body` throws, the element is abandoned and the error propagates.
   */
  withElement<T>(name: string, body: () => T): T {
    const guard = new ElementGuard(this, name);
    let result: T;
    try {
      result = body();
    } catch (error) {
      guard.abandon();
      throw error;
    }
    guard.close();
    return result;
  }

  /**
   * Called by ElementGuard.abandon(). The document can no longer be
   * balanced, so the writer fails and close() drops the buffered output.
   */
  markAbandoned(name: string): void {
    if (this.released || this.poisoned) return;
    this.poisoned = true;
    this.logger.debug('element abandoned', name);
  }

  get openElements(): number {
    return this.engine.openElements;
  }

  /** Whether a failure has been captured or surfaced; the output is then unusable. */
  get failed(): boolean {
    return this.poisoned || this.pending.isSet;
  }

  get closed(): boolean {
    return this.released;
  }

  /**
   * Flush and close the output, rethrowing any failure. On a writer that has
   * already failed nothing more is written and the output is just closed.
   */
  close(): void {
    if (this.released) return;
    if (this.failed) {
      this.release(false);
      return;
    }
    try {
      this.flush();
    } catch (error) {
      this.release(false);
      throw error;
    }
    this.release(true);
  }

  /** Flush what can be flushed and close the output without throwing. */
  dispose(): void {
    if (this.released) return;
    if (!this.failed) {
      try {
        this.flush();
      } catch (error) {
        this.logger.warn('flush failed during teardown', error);
      }
    }
    this.release(false);
  }

  private release(rethrow: boolean): void {
    if (this.released) return;
    this.released = true;
    this.engineError = undefined;
    const result = this.engine.free();
    this.logger.debug('writer closed');
    if (rethrow) {
      this.checkException(result);
      return;
    }
    try {
      this.checkException(result);
    } catch (error) {
      this.logger.warn('output close failed during teardown', error);
    }
  }
}

/**
 * Scoped element: the constructor writes the start tag and close() the end
 * tag, exactly once. If the writer failed in between, close() writes
 * nothing, since the output is already unusable. abandon() fails the writer.
 */
export class ElementGuard {
  private readonly writer: OutputBufferTextWriter;
  private readonly name: string;
  private done = false;

  constructor(writer: OutputBufferTextWriter, name: string) {
    this.writer = writer;
    this.name = name;
    writer.writeStartElement(name);
  }

  close(): void {
    if (this.done) return;
    this.done = true;
    if (this.writer.failed || this.writer.closed) return;
    this.writer.writeEndElement();
  }

  /** Give up the element without writing its end tag. The writer is failed from then on. */
  abandon(): void {
    if (this.done) return;
    this.done = true;
    this.writer.markAbandoned(this.name);
  }
}
