/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { MarkupIssue } from '../common/errors';
import type { TagTable } from '../tags/tag-table';

export type { MarkupIssue };

/**
 * Result of reading tag offsets out of markup text.
 */
export interface MarkupParseResult {
  /** Tag table over the text, or undefined when the markup is not well formed. */
  table: TagTable | undefined;
  /** Element names, indexed by tag id. */
  tagNames: string[];
  /** Problems found (1-based line and column). */
  errors: MarkupIssue[];
}
