/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { LogLevel, Logger } from '../common/logger';

export interface LogEntry {
  level: LogLevel;
  context: string | undefined;
  message: string;
}

/** Logger for tests; clones share one entry list. */
export class RecordingLogger implements Logger {
  private context: string | undefined;

  constructor(readonly entries: LogEntry[] = []) {
    this.context = undefined;
  }

  clone(): RecordingLogger {
    return new RecordingLogger(this.entries);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string): void {
    this.record('trace', message);
  }

  debug(message: string): void {
    this.record('debug', message);
  }

  info(message: string): void {
    this.record('info', message);
  }

  warn(message: string): void {
    this.record('warn', message);
  }

  error(message: string): void {
    this.record('error', message);
  }

  private record(level: LogLevel, message: string): void {
    this.entries.push({ level, context: this.context, message });
  }
}
