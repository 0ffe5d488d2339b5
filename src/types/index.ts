// SPDX-License-Identifier: Apache-2.0

import {type AnyYargs, type ArgvStruct} from './aliases.js';

// NOTE: DO NOT add any deployer imports in this file to avoid circular dependencies

export interface CommandDefinition {
  command: string;
  desc: string;
  builder?: (yargs: AnyYargs) => AnyYargs;
  handler?: (argv: ArgvStruct) => Promise<void>;
}
