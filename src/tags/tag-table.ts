/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { PreconditionError, TagTableError } from '../common/errors';
import { ROOT_TAG, TAG_FIELDS, type TagBounds, type TagRecord, type TagTableData } from './types';

/**
 * Immutable table of tags for one document plus the parent-change index used to
 * find the innermost tag enclosing an offset.
 *
 * Tags live in a flat arena addressed by id, so climbing to a parent is an array
 * read. ROOT_TAG has virtual bounds [0, docLength) and encloses every offset.
 */
export class TagTable {
  readonly docLength: number;
  readonly size: number;

  private readonly tagInfo: Int32Array;
  private readonly parentChangeOffsets: Int32Array;
  private readonly parentChangeIds: Int32Array;

  /** Copies the arrays; later changes to `data` do not reach the table. */
  constructor(data: TagTableData) {
    const tagInfo = data.tagInfo.slice();
    const parentChangeOffsets = data.parentChangeOffsets.slice();
    const parentChangeIds = data.parentChangeIds.slice();
    const docLength = data.docLength;
    validateData(tagInfo, parentChangeOffsets, parentChangeIds, docLength);
    this.tagInfo = tagInfo;
    this.parentChangeOffsets = parentChangeOffsets;
    this.parentChangeIds = parentChangeIds;
    this.docLength = docLength;
    this.size = tagInfo.length / TAG_FIELDS;
    Object.freeze(this);
  }

  /**
   * Build a table from explicit records (ids are array positions). Validates
   * nesting and derives the parent-change index.
   */
  static fromRecords(records: readonly TagBounds[], docLength: number): TagTable {
    validateRecords(records, docLength);

    const tagInfo = new Int32Array(records.length * TAG_FIELDS);
    // A tag opening where another closes wins the shared offset, hence kind 0 (close) sorts first.
    const events: Array<{ offset: number; kind: 0 | 1; tagId: number }> = [];
    records.forEach((r, id) => {
      tagInfo.set([r.parent, r.openStart, r.openEnd, r.closeStart, r.closeEnd], id * TAG_FIELDS);
      events.push({ offset: r.openStart, kind: 1, tagId: id });
      events.push({ offset: r.closeEnd, kind: 0, tagId: r.parent });
    });
    events.sort((a, b) => a.offset - b.offset || a.kind - b.kind);

    const offsets: number[] = [];
    const ids: number[] = [];
    for (const { offset, tagId } of events) {
      if (offsets.length > 0 && offsets[offsets.length - 1] === offset) {
        ids[ids.length - 1] = tagId;
      } else {
        offsets.push(offset);
        ids.push(tagId);
      }
    }

    return new TagTable({
      tagInfo,
      parentChangeOffsets: Int32Array.from(offsets),
      parentChangeIds: Int32Array.from(ids),
      docLength,
    });
  }

  parent(tag: number): number {
    if (tag === ROOT_TAG) {
      throw new PreconditionError('UNKNOWN_TAG', 'the root sentinel has no parent');
    }
    return this.field(tag, 0);
  }

  openStart(tag: number): number {
    return tag === ROOT_TAG ? 0 : this.field(tag, 1);
  }

  openEnd(tag: number): number {
    return tag === ROOT_TAG ? 0 : this.field(tag, 2);
  }

  closeStart(tag: number): number {
    return tag === ROOT_TAG ? this.docLength : this.field(tag, 3);
  }

  closeEnd(tag: number): number {
    return tag === ROOT_TAG ? this.docLength : this.field(tag, 4);
  }

  /** Whether offset falls in [openStart, closeEnd) of the tag. The root encloses everything. */
  encloses(tag: number, offset: number): boolean {
    if (tag === ROOT_TAG) return true;
    return offset >= this.openStart(tag) && offset < this.closeEnd(tag);
  }

  tag(id: number): TagRecord {
    return {
      id,
      parent: this.parent(id),
      openStart: this.openStart(id),
      openEnd: this.openEnd(id),
      closeStart: this.closeStart(id),
      closeEnd: this.closeEnd(id),
    };
  }

  /** Ancestors of a tag, innermost first, ending before ROOT_TAG. */
  ancestors(tag: number): number[] {
    const chain: number[] = [];
    for (let t = tag === ROOT_TAG ? ROOT_TAG : this.parent(tag); t !== ROOT_TAG; t = this.parent(t)) {
      chain.push(t);
    }
    return chain;
  }

  /**
   * Innermost tag whose [openStart, closeEnd) contains offset, or ROOT_TAG.
   * Binary search rounding down to the latest parent change at or before offset.
   */
  lookupEnclosingTag(offset: number): number {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.docLength) {
      throw new PreconditionError(
        'OFFSET_OUT_OF_RANGE',
        `offset ${offset} outside document [0, ${this.docLength}]`,
      );
    }
    const offsets = this.parentChangeOffsets;
    let lo = 0;
    let hi = offsets.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      if (offsets[mid] <= offset) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found < 0 ? ROOT_TAG : this.parentChangeIds[found];
  }

  /** Copy of the parent-change index as (offset, tagId) pairs. */
  parentChanges(): Array<{ offset: number; tagId: number }> {
    return Array.from(this.parentChangeOffsets, (offset, i) => ({
      offset,
      tagId: this.parentChangeIds[i],
    }));
  }

  private field(tag: number, slot: number): number {
    if (!Number.isInteger(tag) || tag < 0 || tag >= this.size) {
      throw new PreconditionError('UNKNOWN_TAG', `unknown tag id ${tag} (table has ${this.size})`);
    }
    return this.tagInfo[tag * TAG_FIELDS + slot];
  }
}

function validateRecords(records: readonly TagBounds[], docLength: number): void {
  const children = new Map<number, number[]>();
  records.forEach((r, id) => {
    if (!(r.openStart >= 0 && r.openStart < r.openEnd && r.openEnd <= r.closeStart && r.closeStart <= r.closeEnd)) {
      throw new TagTableError(`tag ${id} has inconsistent delimiter offsets`);
    }
    if (r.closeEnd > docLength) {
      throw new TagTableError(`tag ${id} ends at ${r.closeEnd}, past document length ${docLength}`);
    }
    if (r.parent !== ROOT_TAG) {
      const p = records[r.parent];
      if (r.parent === id || p === undefined) {
        throw new TagTableError(`tag ${id} has invalid parent ${r.parent}`);
      }
      if (r.openStart < p.openEnd || r.closeEnd > p.closeStart) {
        throw new TagTableError(`tag ${id} is not nested inside its parent ${r.parent}`);
      }
    }
    const siblings = children.get(r.parent) ?? [];
    siblings.push(id);
    children.set(r.parent, siblings);
  });

  for (const siblings of children.values()) {
    const sorted = siblings.map((id) => records[id]).sort((a, b) => a.openStart - b.openStart);
    for (let i = 1; i < sorted.length; i++) {
      if (sorted[i].openStart < sorted[i - 1].closeEnd) {
        throw new TagTableError(`sibling tags overlap at offset ${sorted[i].openStart}`);
      }
    }
  }
}

function validateData(
  tagInfo: Int32Array,
  parentChangeOffsets: Int32Array,
  parentChangeIds: Int32Array,
  docLength: number
): void {
  if (!Number.isInteger(docLength) || docLength < 0) {
    throw new TagTableError(`invalid document length ${docLength}`);
  }
  if (tagInfo.length % TAG_FIELDS !== 0) {
    throw new TagTableError(`tag info length ${tagInfo.length} is not a multiple of ${TAG_FIELDS}`);
  }
  const size = tagInfo.length / TAG_FIELDS;
  for (let id = 0; id < size; id++) {
    const base = id * TAG_FIELDS;
    const parent = tagInfo[base];
    const [openStart, openEnd, closeStart, closeEnd] = tagInfo.subarray(base + 1, base + TAG_FIELDS);
    if (parent !== ROOT_TAG && (parent < 0 || parent >= size || parent === id)) {
      throw new TagTableError(`tag ${id} has invalid parent ${parent}`);
    }
    if (!(openStart >= 0 && openStart < openEnd && openEnd <= closeStart && closeStart <= closeEnd)) {
      throw new TagTableError(`tag ${id} has inconsistent delimiter offsets`);
    }
    if (closeEnd > docLength) {
      throw new TagTableError(`tag ${id} ends at ${closeEnd}, past document length ${docLength}`);
    }
  }

  if (parentChangeOffsets.length !== parentChangeIds.length) {
    throw new TagTableError('parent change offsets and ids differ in length');
  }
  for (let i = 0; i < parentChangeOffsets.length; i++) {
    const offset = parentChangeOffsets[i];
    if (offset < 0 || offset > docLength) {
      throw new TagTableError(`parent change offset ${offset} outside document [0, ${docLength}]`);
    }
    if (i > 0 && offset <= parentChangeOffsets[i - 1]) {
      throw new TagTableError(`parent change offsets not strictly ascending at index ${i}`);
    }
    const tagId = parentChangeIds[i];
    if (tagId !== ROOT_TAG && (tagId < 0 || tagId >= size)) {
      throw new TagTableError(`parent change ${i} names unknown tag ${tagId}`);
    }
  }
}
