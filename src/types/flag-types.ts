// SPDX-License-Identifier: Apache-2.0

export type FlagType = 'boolean' | 'string' | 'number';

export interface Definition {
  describe: string;
  type: FlagType;
  defaultValue?: boolean | string | number;
  alias?: string;
}

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}

/** A positional argument named in a subcommand's name, e.g. `<host>` in `restore <host>`. */
export interface PositionalArgument {
  name: string;
  describe: string;
}
