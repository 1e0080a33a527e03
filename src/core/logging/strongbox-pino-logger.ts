// SPDX-License-Identifier: Apache-2.0

import pino, {type Logger as PinoLogger, type TransportTargetOptions} from 'pino';
import {mkdirSync} from 'node:fs';
import path from 'node:path';
import {v4 as uuidv4} from 'uuid';
// eslint-disable-next-line unicorn/import-style
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type StrongboxLogger} from './strongbox-logger.js';
import {MessageLevel} from './message-level.js';

type PinoLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Pino-based implementation of the StrongboxLogger interface.
 *
 * Emits two files under the logs directory:
 *  - strongbox.ndjson : newline-delimited JSON (authoritative)
 *  - strongbox.log    : pretty human-readable
 */
@injectable()
export class StrongboxPinoLogger implements StrongboxLogger {
  private readonly pinoLogger: PinoLogger;
  private developmentMode: boolean;
  private traceId?: string;
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use (fatal|error|warn|info|debug|trace)
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logsDirectory - where strongbox.ndjson and strongbox.log are written
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogsDirectory) logsDirectory?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name) ?? 'info';
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    const directory: string = patchInject(logsDirectory, InjectTokens.LogsDirectory, this.constructor.name);

    this.nextTraceId();

    // pino/file does not create missing parents
    mkdirSync(directory, {recursive: true});

    const ndjsonTarget: TransportTargetOptions = {
      target: 'pino/file',
      level,
      options: {destination: path.join(directory, 'strongbox.ndjson')},
    };

    const prettyTarget: TransportTargetOptions = {
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(directory, 'strongbox.log'),
        translateTime: 'HH:MM:ss.l',
        colorize: false,
        messageKey: 'msg',
        messageFormat: '{msg} [traceId="{traceId}"]',
        ignore: 'pid,hostname,traceId',
        colorizeObjects: false,
        crlf: false,
        hideObject: false,
      },
    };

    const transport: pino.ThreadStream = pino.transport({targets: [ndjsonTarget, prettyTarget]});

    this.pinoLogger = pino(
      {
        level,
        mixin: (): {traceId?: string} => (this.traceId ? {traceId: this.traceId} : {}),
        redact: {
          paths: ['*.password', '*.privateKey', '*.identityFile', '*.license'],
          remove: true,
        },
      },
      transport,
    );
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public prepMeta(meta: Record<string, unknown> = {}): Record<string, unknown> {
    meta.traceId = this.traceId;
    return meta;
  }

  public showUser(message: unknown, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showNotice(level: MessageLevel, message: string): void {
    switch (level) {
      case MessageLevel.ERROR: {
        console.log(chalk.red(message));
        this.error(message);
        break;
      }
      case MessageLevel.WARN: {
        console.log(chalk.yellow(`Warning: ${message}`));
        this.warn(message);
        break;
      }
      default: {
        console.log(chalk.cyan(message));
        this.info(message);
        break;
      }
    }
  }

  public showUserError(error: unknown): void {
    const stack: {message: string; stacktrace?: string}[] = [
      {
        message: error instanceof Error ? error.message : String(error),
        stacktrace: error instanceof Error ? error.stack : undefined,
      },
    ];
    let cause: unknown = error instanceof Error ? error.cause : undefined;
    let depth: number = 0;
    while (cause instanceof Error && depth < 10) {
      stack.push({message: cause.message, stacktrace: cause.stack});
      cause = cause.cause;
      depth += 1;
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        if (s.stacktrace) {
          const formatted: string = s.stacktrace
            .split('\n')
            .filter((l): boolean => !l.includes('node:internal'))
            .join('\n')
            .trim();
          console.log(indent + chalk.gray(formatted) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of stack[0].message.split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.toPino('error', error, []);
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('debug', message, arguments_);
  }

  public showList(title: string, items: string[] = []): boolean {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green(this.MINOR_LINE_SEPARATOR));
    if (items.length > 0) {
      for (const name of items) {
        this.showUser(chalk.cyan(` - ${name}`));
      }
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }

    this.showUser('\n');
    return true;
  }

  private toPino(level: PinoLevel, message: unknown, arguments_: unknown[]): void {
    const meta: Record<string, unknown> = this.prepMeta({});

    if (message instanceof Error) {
      this.pinoLogger[level]({...meta, err: message}, message.message || 'Error');
      return;
    }

    if (message && typeof message === 'object') {
      const object: Record<string, unknown> = {...meta, ...message};
      if (arguments_.length > 0) {
        this.pinoLogger[level](object, util.format('%s', ...arguments_));
      } else {
        this.pinoLogger[level](object);
      }
      return;
    }

    this.pinoLogger[level](meta, util.format(message, ...arguments_));
  }
}
