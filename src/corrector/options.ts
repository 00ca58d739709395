/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';

/**
 * Lower bound a snapped-back right offset must exceed.
 * - `left-offset`: the left offset passed to the same call.
 * - `previous-result`: the left offset of the previous successful correction
 *   (-1 before the first).
 */
export type SnapBackFloor = 'left-offset' | 'previous-result';

export interface CorrectorOptions {
  /** Pull a right offset that lands just past `>` back to the matching `<`. Default true. */
  snapBackToCloseTag?: boolean;
  /** Default `left-offset`. */
  snapBackFloor?: SnapBackFloor;
  logger?: Logger;
}

export type ResolvedCorrectorOptions = Required<CorrectorOptions>;

export const DEFAULT_SNAP_BACK_FLOOR: SnapBackFloor = 'left-offset';

export function resolveCorrectorOptions(options: CorrectorOptions = {}): ResolvedCorrectorOptions {
  return {
    snapBackToCloseTag: options.snapBackToCloseTag ?? true,
    snapBackFloor: options.snapBackFloor ?? DEFAULT_SNAP_BACK_FLOOR,
    logger: options.logger ?? new ConsoleLogger(),
  };
}
