/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import xmlFormat from 'xml-formatter';
import type { Output } from '../bridge/text-writer';

/** Output collecting everything written in memory. */
export class BufferOutput implements Output {
  private readonly chunks: Buffer[] = [];
  private closeCount = 0;

  write(buffer: Uint8Array, len: number): number {
    if (this.closeCount > 0) throw new Error('BufferOutput is closed');
    this.chunks.push(Buffer.from(buffer.subarray(0, len)));
    return len;
  }

  close(): void {
    this.closeCount++;
  }

  get closed(): boolean {
    return this.closeCount > 0;
  }

  get closeCalls(): number {
    return this.closeCount;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  toString(): string {
    return this.toBuffer().toString('utf8');
  }

  /** Pretty-printed copy of the output for logs; raw text when it does not format. */
  dump(): string {
    const data = this.toString();
    try {
      return xmlFormat(data, { indentation: '  ', collapseContent: true, lineSeparator: '\n' });
    } catch {
      return data;
    }
  }
}
