// SPDX-License-Identifier: Apache-2.0

import {type Options} from 'yargs';

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Options;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}
