/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { OffsetCorrector } from './corrector/offset-corrector';
export { resolveCorrectorOptions, DEFAULT_SNAP_BACK_FLOOR } from './corrector/options';
export type { CorrectorOptions, ResolvedCorrectorOptions, SnapBackFloor } from './corrector/options';
export type { CorrectedSpan, CandidateSpan, BatchCorrection } from './corrector/types';
export { TagTable } from './tags/tag-table';
export { TagTableBuilder } from './tags/tag-table-builder';
export { ROOT_TAG, TAG_FIELDS } from './tags/types';
export type { TagBounds, TagRecord, TagTableData } from './tags/types';
export { parseMarkup, validateMarkup } from './markup/xml-tag-parser';
export type { ParseMarkupOptions } from './markup/xml-tag-parser';
export { isMarkupUsable, formatMarkupIssues } from './markup/diagnostics';
export type { MarkupParseResult } from './markup/types';
export {
  CorrectorError,
  PreconditionError,
  TagTableError,
  MarkupError,
  isCorrectorError,
} from './common/errors';
export type { CorrectorErrorCode, MarkupIssue } from './common/errors';
export type { Logger, LogLevel } from './common/logger';
export { LOG_LEVELS, scopedLogger } from './common/logger';
export { ConsoleLogger } from './common/console-logger';
