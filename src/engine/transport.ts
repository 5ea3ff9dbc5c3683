/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/**
 * Callback table the reader engine pulls bytes through. Callbacks must not
 * throw: read returns the byte count (0 at end of input, negative on
 * failure) and close returns 0 on success.
 */
export interface InputTransport<C> {
  context: C;
  read: (context: C, buffer: Uint8Array, len: number) => number;
  close: (context: C) => number;
}

/**
 * Callback table the writer engine pushes bytes through. write returns the
 * number of bytes accepted or a negative value on failure.
 */
export interface OutputTransport<C> {
  context: C;
  write: (context: C, buffer: Uint8Array, len: number) => number;
  close: (context: C) => number;
}
