/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/** Source encodings the reader accepts. 'none' sniffs the byte order mark. */
export type CharEncoding = 'none' | 'utf-8' | 'utf-16le' | 'utf-16be' | 'latin1';
export type ResolvedEncoding = Exclude<CharEncoding, 'none'>;

type DeclaredEncoding = ResolvedEncoding | 'ascii' | 'utf-16';

const DECLARED_LABELS: Record<string, DeclaredEncoding> = {
  'utf-8': 'utf-8',
  utf8: 'utf-8',
  'us-ascii': 'ascii',
  ascii: 'ascii',
  'utf-16': 'utf-16',
  utf16: 'utf-16',
  'utf-16le': 'utf-16le',
  'utf-16be': 'utf-16be',
  'iso-8859-1': 'latin1',
  'iso_8859-1': 'latin1',
  'iso8859-1': 'latin1',
  latin1: 'latin1',
  'windows-1252': 'latin1',
};

/** Bytes needed before detectEncoding() can decide. */
export const SNIFF_LENGTH = 4;

export function detectEncoding(head: Uint8Array): ResolvedEncoding {
  const [b0, b1, b2, b3] = head;
  if (b0 === 0xef && b1 === 0xbb && b2 === 0xbf) return 'utf-8';
  if (b0 === 0xff && b1 === 0xfe) return 'utf-16le';
  if (b0 === 0xfe && b1 === 0xff) return 'utf-16be';
  if (b0 === 0x3c && b1 === 0x00 && b2 === 0x3f && b3 === 0x00) return 'utf-16le';
  if (b0 === 0x00 && b1 === 0x3c && b2 === 0x00 && b3 === 0x3f) return 'utf-16be';
  return 'utf-8';
}

/**
 * Check the encoding named in an XML declaration against the decoder in use.
 * Returns undefined when compatible, otherwise the reason.
 */
export function checkDeclaredEncoding(
  declared: string,
  active: ResolvedEncoding
): 'unsupported' | 'mismatch' | undefined {
  const label = DECLARED_LABELS[declared.trim().toLowerCase()];
  if (label === undefined) return 'unsupported';
  switch (label) {
    case 'ascii':
      return active === 'utf-8' || active === 'latin1' ? undefined : 'mismatch';
    case 'utf-16':
      return active === 'utf-16le' || active === 'utf-16be' ? undefined : 'mismatch';
    default:
      return label === active ? undefined : 'mismatch';
  }
}
