/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Severity order, lowest first. */
export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface Logger {
  clone(): Logger;
  setContext(context: string | undefined): void;
  trace(message: string, ...attributes: unknown[]): void;
  debug(message: string, ...attributes: unknown[]): void;
  info(message: string, ...attributes: unknown[]): void;
  warn(message: string, ...attributes: unknown[]): void;
  error(message: string, ...attributes: unknown[]): void;
}

/**
 * Clone a caller-supplied logger and scope it, so components never change the
 * context of the instance they were handed.
 */
export function scopedLogger(base: Logger, context: string): Logger {
  const logger = base.clone();
  logger.setContext(context);
  return logger;
}
