/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type CorrectorErrorCode =
  | 'OFFSET_OUT_OF_RANGE'
  | 'UNKNOWN_TAG'
  | 'INVALID_TAG_TABLE'
  | 'INVALID_MARKUP';

export class CorrectorError extends Error {
  code: CorrectorErrorCode;

  constructor(code: CorrectorErrorCode, message: string) {
    super(message);
    this.name = 'CorrectorError';
    this.code = code;
  }
}

/** Caller broke a documented precondition; the result would be meaningless. */
export class PreconditionError extends CorrectorError {
  constructor(code: 'OFFSET_OUT_OF_RANGE' | 'UNKNOWN_TAG', message: string) {
    super(code, message);
    this.name = 'PreconditionError';
  }
}

export class TagTableError extends CorrectorError {
  constructor(message: string) {
    super('INVALID_TAG_TABLE', message);
    this.name = 'TagTableError';
  }
}

export interface MarkupIssue {
  line: number;
  column: number;
  message: string;
}

export class MarkupError extends CorrectorError {
  issues: MarkupIssue[];

  constructor(issues: MarkupIssue[]) {
    const first = issues[0];
    super(
      'INVALID_MARKUP',
      first
        ? `Unusable markup at ${first.line}:${first.column}: ${first.message}`
        : 'Unusable markup: no tags could be read',
    );
    this.name = 'MarkupError';
    this.issues = issues;
  }
}

export function isCorrectorError(error: unknown): error is CorrectorError {
  return error instanceof CorrectorError;
}
