/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Engine error reporting: numeric domains/codes/levels, the raw error record
  and the module-level last-error slot. The slot is overwritten in place by
  every new error, so consumers must copy what they want to keep.
*/

export const XmlErrorDomain = {
  None: 0,
  Parser: 1,
  Memory: 6,
  Output: 7,
  IO: 8,
  Writer: 25,
  I18N: 27,
} as const;
export type XmlErrorDomain = (typeof XmlErrorDomain)[keyof typeof XmlErrorDomain];

export const XmlErrorLevel = {
  None: 0,
  Warning: 1,
  Error: 2,
  Fatal: 3,
} as const;
export type XmlErrorLevel = (typeof XmlErrorLevel)[keyof typeof XmlErrorLevel];

export const XmlErrorCode = {
  Ok: 0,
  InternalError: 1,
  NoMemory: 2,
  DocumentStart: 3,
  DocumentEmpty: 4,
  DocumentEnd: 5,
  InvalidChar: 9,
  EntityRef: 26,
  UnsupportedEncoding: 32,
  InvalidEncoding: 33,
  EncodingMismatch: 34,
  TagNameMismatch: 76,
  TagNotFinished: 77,
  NotWellFormed: 100,
  IoReadFailed: 1500,
  IoWriteFailed: 1501,
  IoCloseFailed: 1502,
  IoShortWrite: 1503,
  WriterInvalidState: 1600,
  WriterAttributeOutOfPlace: 1601,
  WriterDuplicateAttribute: 1602,
  WriterInvalidName: 1603,
} as const;
export type XmlErrorCode = (typeof XmlErrorCode)[keyof typeof XmlErrorCode];

/** Bit flags attached to an error record. */
export const XmlErrorFlags = {
  None: 0,
  /** A transport callback reported the failure. */
  FromCallback: 1,
  /** Raised while finishing the input, after the last byte was read. */
  AtEndOfInput: 2,
} as const;

export interface XmlErrorRecord {
  domain: XmlErrorDomain;
  code: XmlErrorCode;
  level: XmlErrorLevel;
  message: string;
  /** Source name, when the input has one. */
  file: string | undefined;
  /** 1-based line, 0 when unknown. */
  line: number;
  /** 1-based column, 0 when unknown. */
  column: number;
  flags: number;
  /** Extra text payload, e.g. the offending element or encoding name. */
  details: string | undefined;
}

export type StructuredErrorHandler = (error: Readonly<XmlErrorRecord>) => void;

function blankRecord(): XmlErrorRecord {
  return {
    domain: XmlErrorDomain.None,
    code: XmlErrorCode.Ok,
    level: XmlErrorLevel.None,
    message: '',
    file: undefined,
    line: 0,
    column: 0,
    flags: XmlErrorFlags.None,
    details: undefined,
  };
}

const lastError: XmlErrorRecord = blankRecord();
let hasLastError = false;

/**
 * The most recent engine error, or undefined when none was raised since the
 * last reset. The returned object is the live slot.
 */
export function getLastError(): Readonly<XmlErrorRecord> | undefined {
  return hasLastError ? lastError : undefined;
}

export function resetLastError(): void {
  Object.assign(lastError, blankRecord());
  hasLastError = false;
}

/**
 * Store an error in the last-error slot and hand the slot to the structured
 * error handler, if one is registered.
 */
export function raiseError(
  handler: StructuredErrorHandler | undefined,
  fields: Partial<XmlErrorRecord> & Pick<XmlErrorRecord, 'domain' | 'code' | 'message'>
): void {
  Object.assign(lastError, blankRecord(), { level: XmlErrorLevel.Error }, fields);
  hasLastError = true;
  if (handler) handler(lastError);
}

function nameOf(table: Record<string, number>, value: number): string {
  for (const [name, v] of Object.entries(table)) {
    if (v === value) return name;
  }
  return String(value);
}

export function domainToString(domain: XmlErrorDomain): string {
  return nameOf(XmlErrorDomain, domain);
}

export function levelToString(level: XmlErrorLevel): string {
  return nameOf(XmlErrorLevel, level);
}

export function codeToString(code: XmlErrorCode): string {
  return nameOf(XmlErrorCode, code);
}
