/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './common/console-logger';
import type { Logger } from './common/logger';
import type { CharEncoding } from './engine/encoding';

/** Envelope written by writeStartDocument() when no arguments are given. */
export const DEFAULT_DOCUMENT = {
  version: '1.0',
  encoding: 'utf-8',
  standalone: 'yes',
} as const;

export const DEFAULT_ENCODING: CharEncoding = 'utf-8';
export const DEFAULT_CHUNK_SIZE = 4096;
export const DEFAULT_BUFFER_SIZE = 4096;

export interface ReaderOptions {
  /** Bytes requested from the input per read. */
  chunkSize?: number;
  /** Source name used in error messages. */
  file?: string;
  logger?: Logger;
  /** Render error domains, levels and codes by name. */
  verboseErrors?: boolean;
}

export interface WriterOptions {
  /** Buffered characters before output is pushed to the sink. */
  bufferSize?: number;
  /** Initial indentation width, see OutputBufferTextWriter.setIndent(). */
  indent?: number;
  logger?: Logger;
  verboseErrors?: boolean;
}

export interface ResolvedReaderOptions {
  chunkSize: number;
  file: string | undefined;
  logger: Logger;
  verboseErrors: boolean;
}

export interface ResolvedWriterOptions {
  bufferSize: number;
  indent: number;
  logger: Logger;
  verboseErrors: boolean;
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
  return {
    chunkSize: positiveInteger('chunkSize', options.chunkSize ?? DEFAULT_CHUNK_SIZE),
    file: options.file,
    logger: options.logger ? options.logger.clone() : new ConsoleLogger(),
    verboseErrors: options.verboseErrors ?? false,
  };
}

export function resolveWriterOptions(options: WriterOptions = {}): ResolvedWriterOptions {
  const indent = options.indent ?? 0;
  if (!Number.isInteger(indent) || indent < 0) {
    throw new RangeError(`indent must be a non-negative integer, got ${indent}`);
  }
  return {
    bufferSize: positiveInteger('bufferSize', options.bufferSize ?? DEFAULT_BUFFER_SIZE),
    indent,
    logger: options.logger ? options.logger.clone() : new ConsoleLogger(),
    verboseErrors: options.verboseErrors ?? false,
  };
}
