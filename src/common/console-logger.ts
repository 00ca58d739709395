/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { LOG_LEVELS, type LogLevel, type Logger } from './logger';

type ConsoleMethod = (...data: unknown[]) => void;

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  private readonly minLevel: LogLevel;

  /**
   * @param minLevel messages below this level are dropped
   */
  constructor(minLevel: LogLevel = 'warn') {
    this.context = undefined;
    this.minLevel = minLevel;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.minLevel);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.emit('trace', console.trace, message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.emit('debug', console.debug, message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.emit('info', console.info, message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.emit('warn', console.warn, message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.emit('error', console.error, message, attributes);
  }

  private emit(level: LogLevel, sink: ConsoleMethod, message: string, attributes: unknown[]): void {
    if (!this.isEnabled(level)) return;
    if (this.context) sink(`[${this.context}]`, message, ...attributes);
    else sink(message, ...attributes);
  }
}
