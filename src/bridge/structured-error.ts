/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import {
  codeToString,
  domainToString,
  getLastError,
  levelToString,
  XmlErrorCode,
  XmlErrorDomain,
  XmlErrorFlags,
  XmlErrorLevel,
} from '../engine/error-record';
import type { XmlErrorRecord } from '../engine/error-record';

/**
 * Owned snapshot of an engine error record. The engine reuses its record for
 * the next error, so an XmlError never references it.
 */
export class XmlError {
  readonly domain: XmlErrorRecord['domain'];
  readonly code: XmlErrorRecord['code'];
  readonly level: XmlErrorRecord['level'];
  readonly message: string;
  readonly file: string | undefined;
  readonly line: number;
  readonly column: number;
  readonly flags: number;
  readonly details: string | undefined;

  private constructor(record: Readonly<XmlErrorRecord>) {
    this.domain = record.domain;
    this.code = record.code;
    this.level = record.level;
    this.message = record.message;
    this.file = record.file;
    this.line = record.line;
    this.column = record.column;
    this.flags = record.flags;
    this.details = record.details;
  }

  static copy(record: Readonly<XmlErrorRecord>): XmlError {
    return new XmlError(record);
  }

  static empty(): XmlError {
    return new XmlError({
      domain: XmlErrorDomain.None,
      code: XmlErrorCode.Ok,
      level: XmlErrorLevel.None,
      message: '',
      file: undefined,
      line: 0,
      column: 0,
      flags: XmlErrorFlags.None,
      details: undefined,
    });
  }

  get isEmpty(): boolean {
    return this.domain === XmlErrorDomain.None && this.code === XmlErrorCode.Ok;
  }

  /** Human-readable text; `verbose` names domain, level and code symbolically. */
  describe(verbose = false): string {
    if (this.isEmpty) return 'Unknown XML error';
    const level = verbose ? levelToString(this.level) : String(this.level);
    const domain = verbose ? domainToString(this.domain) : String(this.domain);
    const code = verbose ? codeToString(this.code) : String(this.code);
    let text = `XML error (level ${level}, domain ${domain}, code ${code}): ${this.message}`;
    if (this.file) text += ` in ${this.file}`;
    if (this.line > 0) text += ` at line ${this.line}, column ${this.column}`;
    return text;
  }
}

/** An engine failure, carrying the snapshot of its error record. */
export class XmlException extends Error {
  readonly error: XmlError;

  constructor(error: XmlError, verbose = false) {
    super(error.describe(verbose));
    this.name = 'XmlException';
    this.error = error;
  }

  /**
   * The error to throw for a snapshot. Out-of-memory conditions become
   * XmlAllocationError so they are not mistaken for malformed input.
   */
  static from(error: XmlError, verbose = false): Error {
    if (error.code === XmlErrorCode.NoMemory) return new XmlAllocationError(error.message);
    return new XmlException(error, verbose);
  }

  /** The error to throw for the engine's last-error slot. */
  static lastError(verbose = false): Error {
    const record = getLastError();
    return XmlException.from(record ? XmlError.copy(record) : XmlError.empty(), verbose);
  }
}

export class XmlAllocationError extends Error {
  constructor(message: string) {
    super(message ? `Allocation failed: ${message}` : 'Allocation failed');
    this.name = 'XmlAllocationError';
  }
}
