/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger, LogLevel } from './logger';

export interface LogEntry {
  level: LogLevel;
  context: string | undefined;
  message: string;
  attributes: unknown[];
}

/**
 * Logger that keeps entries in memory. Clones share the entry list, so a
 * component that clones its logger still reports into the same record.
 */
export class MemoryLogger implements Logger {
  readonly entries: LogEntry[];
  private context: string | undefined;

  constructor(entries: LogEntry[] = []) {
    this.entries = entries;
    this.context = undefined;
  }

  clone(): MemoryLogger {
    return new MemoryLogger(this.entries);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.record('trace', message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.record('debug', message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.record('info', message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.record('warn', message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.record('error', message, attributes);
  }

  /** Entries at the given level. */
  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  private record(level: LogLevel, message: string, attributes: unknown[]): void {
    this.entries.push({ level, context: this.context, message, attributes });
  }
}
