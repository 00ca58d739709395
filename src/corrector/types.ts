/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/** Half-open [start, end) character range over the original (markup-bearing) text. */
export interface CorrectedSpan {
  readonly start: number;
  readonly end: number;
}

/** Candidate span handed in by the tagging side, already mapped to original-text offsets. */
export interface CandidateSpan {
  start: number;
  end: number;
}

export interface BatchCorrection<T extends CandidateSpan> {
  /** Candidates that could be aligned, paired with their corrected span, in input order. */
  corrected: Array<{ candidate: T; span: CorrectedSpan }>;
  /** Candidates that would have to cross non-whitespace text to align. */
  rejected: T[];
}
