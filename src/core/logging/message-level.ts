// SPDX-License-Identifier: Apache-2.0

export enum MessageLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
