// SPDX-License-Identifier: Apache-2.0

import {type ArgumentsCamelCase, type Argv} from 'yargs';

export type AnyObject = Record<string, unknown>;

export type AnyYargs = Argv<AnyObject>;

export type ArgvStruct = ArgumentsCamelCase<AnyObject>;
