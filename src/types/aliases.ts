// SPDX-License-Identifier: Apache-2.0

import {type Argv, type Arguments} from 'yargs';

export type AnyYargs = Argv;
export type ArgvStruct = Arguments;
export type KeyValueMap = Record<string, string>;
