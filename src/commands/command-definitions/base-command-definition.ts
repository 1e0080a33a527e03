// SPDX-License-Identifier: Apache-2.0

import {type CommandDefinition} from '../../types/index.js';
import {type StrongboxLogger} from '../../core/logging/strongbox-logger.js';

/** A top-level strongbox command, exposed to yargs through {@link getCommandDefinition}. */
export abstract class BaseCommandDefinition {
  public static readonly COMMAND_NAME: string;
  protected static readonly DESCRIPTION: string;

  protected constructor(protected readonly logger: StrongboxLogger) {}

  public abstract getCommandDefinition(): CommandDefinition;
}
