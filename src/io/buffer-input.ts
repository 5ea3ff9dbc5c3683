/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Input } from '../bridge/text-reader';

/** Input over bytes held in memory. Strings are taken as UTF-8. */
export class BufferInput implements Input {
  private readonly data: Uint8Array;
  private offset = 0;
  private closeCount = 0;

  constructor(data: Uint8Array | string) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
  }

  read(buffer: Uint8Array, maxLen: number): number {
    if (this.closeCount > 0) throw new Error('BufferInput is closed');
    const count = Math.min(maxLen, buffer.length, this.data.length - this.offset);
    buffer.set(this.data.subarray(this.offset, this.offset + count), 0);
    this.offset += count;
    return count;
  }

  close(): void {
    this.closeCount++;
  }

  get closed(): boolean {
    return this.closeCount > 0;
  }

  /** How often close() was called. */
  get closeCalls(): number {
    return this.closeCount;
  }
}
