// SPDX-License-Identifier: Apache-2.0

import {StrongboxError} from '../errors/strongbox-error.js';
import {type AnyYargs, type ArgvStruct} from '../../types/aliases.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type CommandDefinition} from '../../types/index.js';
import {type CommandFlags, type PositionalArgument} from '../../types/flag-types.js';
import {Flags as flags} from '../../commands/flags.js';

export type CommandHandler = (argv: ArgvStruct) => Promise<boolean>;

export class Subcommand {
  public constructor(
    public readonly name: string,
    public readonly description: string,
    public readonly commandHandlerClass: object,
    public readonly commandHandler: CommandHandler,
    public readonly flags: CommandFlags,
    public readonly positionals: PositionalArgument[] = [],
  ) {}

  /** `name` followed by its positionals, as yargs expects the command string. */
  public get command(): string {
    return [this.name, ...this.positionals.map((positional): string => `<${positional.name}>`)].join(' ');
  }
}

export class CommandGroup {
  public readonly subcommands: Subcommand[] = [];

  public constructor(
    public readonly name: string,
    public readonly description: string,
  ) {}

  public addSubcommand(subcommand: Subcommand): CommandGroup {
    this.subcommands.push(subcommand);
    return this;
  }
}

/**
 * Builds the yargs definition of a top level command: either a single handler (`strongbox backup`), named like the
 * command, or a group of subcommands (`strongbox snapshot list`).
 */
export class CommandBuilder {
  private handler?: Subcommand;
  private group?: CommandGroup;

  public constructor(
    private readonly name: string,
    private readonly description: string,
    private readonly logger: StrongboxLogger,
  ) {}

  public setHandler(subcommand: Subcommand): CommandBuilder {
    this.handler = subcommand;
    return this;
  }

  public setCommandGroup(commandGroup: CommandGroup): CommandBuilder {
    this.group = commandGroup;
    return this;
  }

  public build(): CommandDefinition {
    if (this.handler) {
      return this.leaf(this.handler, this.name);
    }
    if (!this.group) {
      throw new StrongboxError(`Command ${this.name} has neither a handler nor subcommands`);
    }

    const commandName: string = this.name;
    const subcommands: Subcommand[] = this.group.subcommands;
    return {
      command: commandName,
      describe: this.description,
      builder: (yargs: AnyYargs): AnyYargs => {
        for (const subcommand of subcommands) {
          yargs.command(this.leaf(subcommand, `${commandName} ${subcommand.name}`));
        }
        yargs.demandCommand(1, `Select a ${commandName} command`);
        return yargs.help();
      },
      // never reached: demandCommand rejects the group without a subcommand
      handler: (): void => undefined,
    };
  }

  private leaf(subcommand: Subcommand, commandPath: string): CommandDefinition {
    const logger: StrongboxLogger = this.logger;
    return {
      command: subcommand.command,
      describe: subcommand.description,
      builder: (y: AnyYargs): AnyYargs => {
        for (const positional of subcommand.positionals) {
          y.positional(positional.name, {describe: positional.describe, type: 'string'});
        }
        flags.setRequiredCommandFlags(y, ...subcommand.flags.required);
        flags.setOptionalCommandFlags(y, ...subcommand.flags.optional);
        return y;
      },
      handler: async (argv: ArgvStruct): Promise<void> => {
        logger.info(`==== Running '${commandPath}' ===`);

        const handlerCallback: CommandHandler = subcommand.commandHandler.bind(subcommand.commandHandlerClass);
        const response: boolean = await handlerCallback(argv);

        logger.info(`==== Finished running '${commandPath}'====`);

        if (!response) {
          throw new StrongboxError(`Error running ${commandPath}, expected return value to be true`);
        }
      },
    };
  }
}
