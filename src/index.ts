// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import 'dotenv/config';
// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import {container} from 'tsyringe-neo';

import {type StrongboxLogger} from './core/logging/strongbox-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {StrongboxError} from './core/errors/strongbox-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getStrongboxVersion} from '../version.js';
import {ArgumentProcessor} from './argument-processor.js';
import {type AnyObject} from './types/aliases.js';
import * as constants from './core/constants.js';

const VERBOSE_SWITCHES: readonly string[] = ['-v', '--verbose'];

export async function main(argv: string[], context?: {logger?: StrongboxLogger}): Promise<AnyObject> {
  // the log level is fixed when the logger is created, before yargs has parsed anything
  const logLevel: string = argv.slice(2).some((argument): boolean => VERBOSE_SWITCHES.includes(argument))
    ? 'debug'
    : constants.STRONGBOX_LOG_LEVEL;

  try {
    Container.getInstance().init(constants.STRONGBOX_HOME_DIR, logLevel);
  } catch (error) {
    console.error(`Error initializing container: ${error instanceof Error ? error.message : String(error)}`, error);
    throw new StrongboxError('Error initializing container', error);
  }

  const logger: StrongboxLogger = container.resolve<StrongboxLogger>(InjectTokens.StrongboxLogger);

  if (context) {
    // save the logger so that strongbox.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }
  process.on('unhandledRejection', (reason: unknown): void => {
    logger.showUserError(new StrongboxError('Unhandled Rejection', reason));
  });
  process.on('uncaughtException', (error: Error, origin: string): void => {
    logger.showUserError(new StrongboxError(`Uncaught Exception: ${error}, origin: ${origin}`, error));
  });

  logger.debug('Initializing Strongbox CLI');
  if (argv.length >= 3 && ['-version', '--version'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n******************************* Strongbox ****************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getStrongboxVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  return ArgumentProcessor.process(argv);
}
