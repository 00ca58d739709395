/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { MarkupError, PreconditionError, TagTableError } from '../common/errors';
import { scopedLogger, type Logger } from '../common/logger';
import { isMarkupUsable } from '../markup/diagnostics';
import { parseMarkup } from '../markup/xml-tag-parser';
import { TagTable } from '../tags/tag-table';
import { TagTableBuilder } from '../tags/tag-table-builder';
import {
  resolveCorrectorOptions,
  type CorrectorOptions,
  type ResolvedCorrectorOptions,
} from './options';
import type { BatchCorrection, CandidateSpan, CorrectedSpan } from './types';

const WHITESPACE = /\s/;

/**
 * Moves candidate spans computed over markup-stripped text onto tag boundaries
 * of the original text.
 *
 * The left offset is pulled left over whitespace and opening tags, the right
 * offset right over whitespace and closing tags, until both sit inside the same
 * enclosing tag. A span that would have to cross non-whitespace text to get
 * there cannot be corrected.
 *
 * Borrows the text and table; neither is modified. An instance remembers its
 * last result, so share tables between threads of work, not correctors.
 */
export class OffsetCorrector {
  readonly docText: string;
  readonly table: TagTable;

  private readonly options: ResolvedCorrectorOptions;
  private readonly logger: Logger;
  private previous: CorrectedSpan | undefined;

  constructor(docText: string, table: TagTable, options: CorrectorOptions = {}) {
    if (table.docLength !== docText.length) {
      throw new TagTableError(
        `tag table covers ${table.docLength} characters but the text has ${docText.length}`
      );
    }
    this.docText = docText;
    this.table = table;
    this.options = resolveCorrectorOptions(options);
    this.logger = scopedLogger(this.options.logger, 'corrector');
    this.previous = undefined;
  }

  /**
   * Parse XML text and build a corrector over it.
   * @throws MarkupError when the text is not well-formed XML
   */
  static fromMarkup(text: string, options: CorrectorOptions = {}): OffsetCorrector {
    const parsed = parseMarkup(text, { logger: options.logger });
    if (!isMarkupUsable(parsed)) {
      throw new MarkupError(parsed.errors);
    }
    return new OffsetCorrector(text, parsed.table, options);
  }

  /** Corrector over text without any tags; every in-range span is returned as is. */
  static forPlainText(text: string, options: CorrectorOptions = {}): OffsetCorrector {
    return new OffsetCorrector(text, new TagTableBuilder().build(text.length), options);
  }

  /** Most recent successful correction, if any. */
  get lastResult(): CorrectedSpan | undefined {
    return this.previous;
  }

  /**
   * Correct a [leftOffset, rightOffset) candidate.
   * Returns undefined when the span cannot be aligned to tag boundaries.
   */
  correctPair(leftOffset: number, rightOffset: number): CorrectedSpan | undefined {
    this.checkPair(leftOffset, rightOffset);
    const table = this.table;

    let left = leftOffset;
    let right = this.options.snapBackToCloseTag
      ? this.correctEndOffsetForCloseElement(leftOffset, rightOffset)
      : rightOffset;

    const startTag = this.lookupTag(left);
    const endTag = this.lookupTag(right);

    // Climb from the left until reaching the tag that also encloses the right offset.
    let iTag = startTag;
    for (; !table.encloses(iTag, right); iTag = table.parent(iTag)) {
      if (this.hasNonWhitespace(table.openEnd(iTag), left)) {
        return this.unalignable(leftOffset, rightOffset, 'left', iTag);
      }
      left = table.openStart(iTag);
    }
    const ancestorTag = iTag;

    for (iTag = endTag; iTag !== ancestorTag; iTag = table.parent(iTag)) {
      if (this.hasNonWhitespace(right, table.closeStart(iTag))) {
        return this.unalignable(leftOffset, rightOffset, 'right', iTag);
      }
      right = table.closeEnd(iTag);
    }

    const span: CorrectedSpan = Object.freeze({ start: left, end: right });
    this.previous = span;
    return span;
  }

  /**
   * Correct many candidates in order. Rejected candidates are returned, not thrown.
   */
  correctSpans<T extends CandidateSpan>(candidates: readonly T[]): BatchCorrection<T> {
    const result: BatchCorrection<T> = { corrected: [], rejected: [] };
    for (const candidate of candidates) {
      const span = this.correctPair(candidate.start, candidate.end);
      if (span) result.corrected.push({ candidate, span });
      else result.rejected.push(candidate);
    }
    if (result.rejected.length > 0) {
      this.logger.info(`${result.rejected.length} of ${candidates.length} spans could not be aligned`);
    }
    return result;
  }

  /**
   * When the right offset lands just past a closing delimiter, e.g. `foo</tag>|`,
   * pull it back to the `<` of that delimiter: markup stripping attributes the
   * delimiter to the preceding text.
   */
  correctEndOffsetForCloseElement(leftOffset: number, endOffset: number): number {
    if (endOffset < 2 || this.docText.charAt(endOffset - 1) !== '>') return endOffset;
    const newEndOffset = this.docText.lastIndexOf('<', endOffset - 2);
    const floor =
      this.options.snapBackFloor === 'previous-result' ? (this.previous?.start ?? -1) : leftOffset;
    if (newEndOffset > floor && newEndOffset >= leftOffset) return newEndOffset;
    return endOffset;
  }

  /** True if any character in [start, end) is not whitespace. An empty or reversed range has none. */
  hasNonWhitespace(start: number, end: number): boolean {
    for (let i = start; i < end; i++) {
      if (!WHITESPACE.test(this.docText.charAt(i))) return true;
    }
    return false;
  }

  lookupTag(offset: number): number {
    return this.table.lookupEnclosingTag(offset);
  }

  private checkPair(leftOffset: number, rightOffset: number): void {
    const length = this.docText.length;
    if (
      !Number.isInteger(leftOffset) ||
      !Number.isInteger(rightOffset) ||
      leftOffset < 0 ||
      leftOffset > rightOffset ||
      rightOffset > length
    ) {
      throw new PreconditionError(
        'OFFSET_OUT_OF_RANGE',
        `span [${leftOffset}, ${rightOffset}) is not a valid range of a ${length}-character text`
      );
    }
  }

  private unalignable(
    leftOffset: number,
    rightOffset: number,
    side: 'left' | 'right',
    tag: number
  ): undefined {
    this.logger.debug(
      `span [${leftOffset}, ${rightOffset}) unalignable: text between ${side} offset and tag ${tag}`
    );
    return undefined;
  }
}
