/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import type { Output } from '../bridge/text-writer';

/** Output writing a file synchronously. The file is created or truncated on construction. */
export class FileOutput implements Output {
  readonly path: string;
  private fd: number | undefined;

  constructor(path: string) {
    this.path = path;
    this.fd = fs.openSync(path, 'w');
  }

  write(buffer: Uint8Array, len: number): number {
    if (this.fd === undefined) throw new Error(`${this.path} is closed`);
    let written = 0;
    while (written < len) {
      written += fs.writeSync(this.fd, buffer, written, len - written);
    }
    return written;
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    fs.closeSync(fd);
  }
}
