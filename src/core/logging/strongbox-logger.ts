// SPDX-License-Identifier: Apache-2.0

import {type MessageLevel} from './message-level.js';

export interface StrongboxLogger {
  setDevMode(developmentMode: boolean): void;

  nextTraceId(): void;

  prepMeta(meta?: Record<string, unknown>): Record<string, unknown>;

  /** Print to the console and mirror the line into the log files at info level. */
  showUser(message: unknown, ...arguments_: unknown[]): void;

  showUserError(error: unknown): void;

  /** Print a highlighted line; warnings also go to the log files at warn level. */
  showNotice(level: MessageLevel, message: string): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;

  showList(title: string, items?: string[]): boolean;
}
