// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type StrongboxLogger} from './logging/strongbox-logger.js';
import {type ExitFunction} from './lifecycle/scoped-cleanup.js';
import {UserBreak} from './errors/user-break.js';
import {OperatorAbortError} from './errors/operator-abort-error.js';
import * as constants from './constants.js';

/**
 * Reports an error that reached the top of the CLI and ends the process with the matching exit code.
 */
@injectable()
export class ErrorHandler {
  private readonly logger: StrongboxLogger;
  private readonly exit: ExitFunction;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.ProcessExit) exit?: ExitFunction,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.exit = patchInject(exit, InjectTokens.ProcessExit, this.constructor.name);
  }

  public static exitCodeFor(error: unknown): number {
    return error instanceof UserBreak ? constants.EXIT_CODE_SUCCESS : constants.EXIT_CODE_FAILURE;
  }

  public handle(error: unknown): void {
    if (error instanceof UserBreak) {
      this.logger.info(error.message);
    } else if (error instanceof OperatorAbortError) {
      this.logger.showUser(chalk.yellow(error.message));
    } else {
      this.logger.showUserError(error);
    }
    this.exit(ErrorHandler.exitCodeFor(error));
  }
}
