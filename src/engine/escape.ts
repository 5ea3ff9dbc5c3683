/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

const TEXT_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '\r': '&#13;',
};

const ATTRIBUTE_ENTITIES: Record<string, string> = {
  ...TEXT_ENTITIES,
  '"': '&quot;',
  '\n': '&#10;',
  '\t': '&#9;',
};

export function escapeText(text: string): string {
  return text.replace(/[&<>\r]/g, (ch) => TEXT_ENTITIES[ch] ?? ch);
}

/** Escape for a double-quoted attribute value; whitespace controls survive normalization. */
export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"\r\n\t]/g, (ch) => ATTRIBUTE_ENTITIES[ch] ?? ch);
}

const NAME_RE = /^[\p{L}_:][\p{L}\p{N}_.:-]*$/u;

export function isValidName(name: string): boolean {
  return NAME_RE.test(name);
}
