/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { TagTableError } from '../common/errors';
import { TagTable } from './tag-table';
import { ROOT_TAG, TAG_FIELDS } from './types';

/**
 * Populates a TagTable from delimiter events delivered in document order,
 * the way a streaming markup reader reports them. Tags are numbered in the
 * order they are opened, so a parent id is always smaller than its children's.
 */
export class TagTableBuilder {
  private readonly tagInfo: number[] = [];
  private readonly parentChangeOffsets: number[] = [];
  private readonly parentChangeIds: number[] = [];
  private readonly openTags: number[] = [];
  private lastOffset = 0;

  /** Number of tags opened but not yet closed. */
  get depth(): number {
    return this.openTags.length;
  }

  get size(): number {
    return this.tagInfo.length / TAG_FIELDS;
  }

  /** Innermost open tag, or ROOT_TAG. */
  get currentTag(): number {
    return this.openTags.length > 0 ? this.openTags[this.openTags.length - 1] : ROOT_TAG;
  }

  openTag(openStart: number, openEnd: number): number {
    this.advance(openStart, `open tag at ${openStart}`);
    if (openEnd <= openStart) {
      throw new TagTableError(`open delimiter [${openStart}, ${openEnd}) is empty`);
    }
    const id = this.size;
    this.tagInfo.push(this.currentTag, openStart, openEnd, -1, -1);
    this.recordParentChange(openStart, id);
    this.openTags.push(id);
    this.lastOffset = openEnd;
    return id;
  }

  /**
   * Close the innermost open tag. An empty element such as `<br/>` is closed
   * with a zero-width delimiter at its openEnd.
   */
  closeTag(closeStart: number, closeEnd: number): number {
    const id = this.currentTag;
    if (id === ROOT_TAG) {
      throw new TagTableError(`close tag at ${closeStart} has no matching open tag`);
    }
    this.advance(closeStart, `close tag at ${closeStart}`);
    if (closeEnd < closeStart) {
      throw new TagTableError(`close delimiter [${closeStart}, ${closeEnd}) is reversed`);
    }
    this.openTags.pop();
    const base = id * TAG_FIELDS;
    this.tagInfo[base + 3] = closeStart;
    this.tagInfo[base + 4] = closeEnd;
    this.recordParentChange(closeEnd, this.currentTag);
    this.lastOffset = closeEnd;
    return id;
  }

  build(docLength: number): TagTable {
    if (this.openTags.length > 0) {
      throw new TagTableError(`${this.openTags.length} tag(s) still open at end of document`);
    }
    if (this.lastOffset > docLength) {
      throw new TagTableError(`tag offset ${this.lastOffset} past document length ${docLength}`);
    }
    return new TagTable({
      tagInfo: Int32Array.from(this.tagInfo),
      parentChangeOffsets: Int32Array.from(this.parentChangeOffsets),
      parentChangeIds: Int32Array.from(this.parentChangeIds),
      docLength,
    });
  }

  private advance(offset: number, what: string): void {
    if (!Number.isInteger(offset) || offset < this.lastOffset) {
      throw new TagTableError(`${what} goes backwards (previous delimiter ended at ${this.lastOffset})`);
    }
  }

  /** Keeps offsets strictly ascending: a change at the same offset replaces the last one. */
  private recordParentChange(offset: number, tagId: number): void {
    const last = this.parentChangeOffsets.length - 1;
    if (last >= 0 && this.parentChangeOffsets[last] === offset) {
      this.parentChangeIds[last] = tagId;
    } else {
      this.parentChangeOffsets.push(offset);
      this.parentChangeIds.push(tagId);
    }
  }
}
