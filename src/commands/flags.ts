// SPDX-License-Identifier: Apache-2.0

import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {type CommandFlag} from '../types/flag-types.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import * as constants from '../core/constants.js';

export class Flags {
  private static setCommandFlags(y: AnyYargs, demandOption: boolean, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        type: flag.definition.type,
        alias: flag.definition.alias,
        default: flag.definition.defaultValue,
        demandOption,
      });
    }
  }

  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    Flags.setCommandFlags(y, true, ...commandFlags);
  }

  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    Flags.setCommandFlags(y, false, ...commandFlags);
  }

  public static getString(argv: ArgvStruct, flag: CommandFlag): string | undefined {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new IllegalArgumentError(`--${flag.name} expects a string`, value);
    }
    return value;
  }

  public static getBoolean(argv: ArgvStruct, flag: CommandFlag): boolean {
    const value: unknown = argv[flag.name];
    return value === true;
  }

  public static getNumber(argv: ArgvStruct, flag: CommandFlag): number | undefined {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new IllegalArgumentError(`--${flag.name} expects a number`, value);
    }
    return value;
  }

  public static readonly config: CommandFlag = {
    constName: 'config',
    name: 'config',
    definition: {
      describe: `Configuration file (defaults to $${constants.CONFIG_FILE_ENVIRONMENT_VARIABLE} or ./${constants.DEFAULT_CONFIG_FILE_NAME})`,
      type: 'string',
    },
  };

  public static readonly verbose: CommandFlag = {
    constName: 'verbose',
    name: 'verbose',
    definition: {
      describe: 'Log at debug level',
      alias: 'v',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Show full stack traces of errors',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly force: CommandFlag = {
    constName: 'force',
    name: 'force',
    definition: {
      describe: 'Restore without asking for confirmation',
      alias: 'f',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly restoreSettings: CommandFlag = {
    constName: 'restoreSettings',
    name: 'restore-settings',
    definition: {
      describe: 'Restore settings and license even onto a configured appliance',
      alias: 'c',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly snapshot: CommandFlag = {
    constName: 'snapshot',
    name: 'snapshot',
    definition: {
      describe: 'Snapshot id to restore (defaults to the current snapshot)',
      alias: 's',
      type: 'string',
    },
  };

  public static readonly keep: CommandFlag = {
    constName: 'keep',
    name: 'keep',
    definition: {
      describe: 'Committed snapshots to keep (defaults to numSnapshots)',
      type: 'number',
    },
  };

  /** Accepted by every command. */
  public static readonly globalFlags: CommandFlag[] = [Flags.config, Flags.verbose, Flags.devMode];
}
