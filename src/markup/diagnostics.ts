/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { TagTable } from '../tags/tag-table';
import type { MarkupIssue, MarkupParseResult } from './types';

/**
 * Whether the parse result can back an offset corrector (no errors, table built).
 */
export function isMarkupUsable(
  parseResult: MarkupParseResult
): parseResult is MarkupParseResult & { table: TagTable } {
  return parseResult.errors.length === 0 && parseResult.table !== undefined;
}

/** One issue per line, `line:column message`. */
export function formatMarkupIssues(issues: readonly MarkupIssue[]): string {
  return issues.map((issue) => `${issue.line}:${issue.column} ${issue.message}`).join('\n');
}
