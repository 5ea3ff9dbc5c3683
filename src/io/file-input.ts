/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import type { Input } from '../bridge/text-reader';

/** Input reading a file synchronously. The file is opened on construction. */
export class FileInput implements Input {
  readonly path: string;
  private fd: number | undefined;

  constructor(path: string) {
    this.path = path;
    this.fd = fs.openSync(path, 'r');
  }

  read(buffer: Uint8Array, maxLen: number): number {
    if (this.fd === undefined) throw new Error(`${this.path} is closed`);
    return fs.readSync(this.fd, buffer, 0, Math.min(maxLen, buffer.length), null);
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    fs.closeSync(fd);
  }
}
