/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/** Reader node kinds, using the usual XML text reader numbering. */
export const NodeType = {
  None: 0,
  Element: 1,
  Attribute: 2,
  Text: 3,
  CDATA: 4,
  EntityReference: 5,
  Entity: 6,
  ProcessingInstruction: 7,
  Comment: 8,
  Document: 9,
  DocumentType: 10,
  DocumentFragment: 11,
  Notation: 12,
  Whitespace: 13,
  SignificantWhitespace: 14,
  EndElement: 15,
  EndEntity: 16,
  XmlDeclaration: 17,
} as const;
export type NodeType = (typeof NodeType)[keyof typeof NodeType];

export function nodeTypeToString(type: NodeType): string {
  for (const [name, value] of Object.entries(NodeType)) {
    if (value === type) return name;
  }
  return String(type);
}

/** Whether the node carries character data that readString() collects. */
export function isTextual(type: NodeType): boolean {
  return (
    type === NodeType.Text ||
    type === NodeType.CDATA ||
    type === NodeType.Whitespace ||
    type === NodeType.SignificantWhitespace
  );
}
