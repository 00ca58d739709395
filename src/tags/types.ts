/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Tag records: one markup element as the offsets of its delimiters.
*/

/** Sentinel id for "no enclosing tag"; its virtual boundaries are the whole document. */
export const ROOT_TAG = -1;

/** Slots per tag in the flat arena: parent, openStart, openEnd, closeStart, closeEnd. */
export const TAG_FIELDS = 5;

export interface TagBounds {
  /** Innermost enclosing tag id, or ROOT_TAG. */
  parent: number;
  /** Offset of the first character of the opening delimiter, e.g. `<a>`. */
  openStart: number;
  /** Offset just past the opening delimiter. */
  openEnd: number;
  /** Offset of the first character of the closing delimiter, e.g. `</a>`. */
  closeStart: number;
  /** Offset just past the closing delimiter. */
  closeEnd: number;
}

export interface TagRecord extends TagBounds {
  /** Sequential id, 0-based, in registration order. */
  id: number;
}

/** Raw arrays behind a TagTable; parentChangeOffsets is strictly ascending. */
export interface TagTableData {
  tagInfo: Int32Array;
  parentChangeOffsets: Int32Array;
  parentChangeIds: Int32Array;
  docLength: number;
}
