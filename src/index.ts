/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { InputBufferTextReader } from './bridge/text-reader';
export type { Input } from './bridge/text-reader';
export { OutputBufferTextWriter, ElementGuard } from './bridge/text-writer';
export type { Output } from './bridge/text-writer';
export { PendingException } from './bridge/pending-exception';
export { XmlError, XmlException, XmlAllocationError } from './bridge/structured-error';
export { ParseError, LogicError } from './bridge/errors';
export { BufferInput } from './io/buffer-input';
export { FileInput } from './io/file-input';
export { BufferOutput } from './io/buffer-output';
export { FileOutput } from './io/file-output';
export { NodeType, nodeTypeToString } from './engine/node-types';
export type { CharEncoding } from './engine/encoding';
export {
  XmlErrorCode,
  XmlErrorDomain,
  XmlErrorFlags,
  XmlErrorLevel,
  codeToString,
  domainToString,
  levelToString,
  getLastError,
  resetLastError,
} from './engine/error-record';
export type { XmlErrorRecord } from './engine/error-record';
export { DEFAULT_DOCUMENT } from './config';
export type { ReaderOptions, WriterOptions } from './config';
export { ConsoleLogger } from './common/console-logger';
export { MemoryLogger } from './common/memory-logger';
export type { Logger, LogLevel } from './common/logger';
