// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {type AnyObject} from './aliases.js';

// NOTE: DO NOT add any Strongbox imports in this file to avoid circular dependencies

export type CommandDefinition = CommandModule<AnyObject, AnyObject>;
