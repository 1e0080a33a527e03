// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from './core/errors/strongbox-error.js';
import {Flags as flags} from './commands/flags.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type StrongboxLogger} from './core/logging/strongbox-logger.js';
import {type Commands} from './commands/commands.js';
import {type AnyObject} from './types/aliases.js';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';

export class ArgumentProcessor {
  public static async process(argv: string[]): Promise<AnyObject> {
    const logger: StrongboxLogger = container.resolve<StrongboxLogger>(InjectTokens.StrongboxLogger);
    const commands: Commands = container.resolve<Commands>(InjectTokens.Commands);

    logger.debug('Initializing commands');
    const rootCmd = yargs(hideBin(argv))
      .scriptName('strongbox')
      .usage('Usage:\n  strongbox <command> [options]')
      .alias('h', 'help')
      .version(false)
      .command(commands.getCommandDefinitions())
      .strict()
      .demandCommand(1, 'Select a command');

    rootCmd.middleware((parsed: AnyObject): void => {
      logger.setDevMode(parsed[flags.devMode.name] === true);
    });

    rootCmd.wrap(null);

    rootCmd.fail((message: string | undefined, error: Error | undefined): void => {
      if (error) {
        throw error;
      }
      logger.showUser(message ?? '');
      rootCmd.showHelp();
      throw new StrongboxError(message ?? 'Invalid arguments');
    });

    logger.debug('Setting up flags');
    flags.setOptionalCommandFlags(rootCmd, ...flags.globalFlags);
    logger.debug('Parsing root command (executing the commands)');
    return rootCmd.parseAsync();
  }
}
