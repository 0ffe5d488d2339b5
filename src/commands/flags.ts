// SPDX-License-Identifier: Apache-2.0

import {type AnyYargs, type ArgvStruct, type KeyValueMap} from '../types/aliases.js';
import {type CommandFlag} from '../types/flag-types.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';

/**
 * Every option the command line accepts. Commands pick their required and optional subsets from here.
 */
export class Flags {
  private constructor() {}

  public static readonly definitionName: CommandFlag = {
    constName: 'definitionName',
    name: 'name',
    definition: {
      describe: 'Name of the application definition',
      type: 'string',
    },
  };

  public static readonly group: CommandFlag = {
    constName: 'group',
    name: 'group',
    definition: {
      describe: 'Group the application belongs to, prefixed to its deployment id',
      type: 'string',
    },
  };

  public static readonly path: CommandFlag = {
    constName: 'path',
    name: 'path',
    definition: {
      describe: 'Path of the application archive to upload',
      type: 'string',
      conflicts: 'image',
    },
  };

  public static readonly image: CommandFlag = {
    constName: 'image',
    name: 'image',
    definition: {
      describe: 'Container image to run instead of an uploaded archive',
      type: 'string',
      conflicts: 'path',
    },
  };

  public static readonly property: CommandFlag = {
    constName: 'property',
    name: 'property',
    definition: {
      describe: 'Application property as key=value, may be repeated',
      type: 'string',
      array: true,
      alias: 'p',
    },
  };

  public static readonly deploymentProperty: CommandFlag = {
    constName: 'deploymentProperty',
    name: 'deployment-property',
    definition: {
      describe: 'Deployment property as key=value overriding the deployer defaults, may be repeated',
      type: 'string',
      array: true,
      alias: 'd',
    },
  };

  public static readonly argument: CommandFlag = {
    constName: 'argument',
    name: 'arg',
    definition: {
      describe: 'Command line argument handed to the application, may be repeated',
      type: 'string',
      array: true,
    },
  };

  public static readonly deploymentId: CommandFlag = {
    constName: 'deploymentId',
    name: 'id',
    definition: {
      describe: 'Deployment id returned by deploy',
      type: 'string',
    },
  };

  public static readonly count: CommandFlag = {
    constName: 'count',
    name: 'count',
    definition: {
      describe: 'Number of instances',
      type: 'number',
    },
  };

  public static readonly memory: CommandFlag = {
    constName: 'memory',
    name: 'memory',
    definition: {
      describe: 'Memory limit per instance, e.g. 1024m or 2g',
      type: 'string',
    },
  };

  public static readonly disk: CommandFlag = {
    constName: 'disk',
    name: 'disk',
    definition: {
      describe: 'Disk limit per instance, e.g. 1024m or 2g',
      type: 'string',
    },
  };

  public static readonly wait: CommandFlag = {
    constName: 'wait',
    name: 'wait',
    definition: {
      describe: 'Wait until the platform finishes the operation',
      type: 'boolean',
      default: true,
    },
  };

  public static readonly taskId: CommandFlag = {
    constName: 'taskId',
    name: 'task-id',
    definition: {
      describe: 'Id of a launched task',
      type: 'string',
    },
  };

  public static readonly applicationName: CommandFlag = {
    constName: 'applicationName',
    name: 'app-name',
    definition: {
      describe: 'Name of the application hosting the tasks',
      type: 'string',
    },
  };

  public static readonly scheduleName: CommandFlag = {
    constName: 'scheduleName',
    name: 'schedule-name',
    definition: {
      describe: 'Name of the schedule',
      type: 'string',
    },
  };

  public static readonly cronExpression: CommandFlag = {
    constName: 'cronExpression',
    name: 'cron',
    definition: {
      describe: 'Cron expression the schedule fires on',
      type: 'string',
    },
  };

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Print full stack traces and causes when a command fails',
      type: 'boolean',
      default: false,
    },
  };

  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {...flag.definition, demandOption: true});
    }
  }

  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {...flag.definition, demandOption: false});
    }
  }

  public static readString(argv: ArgvStruct, flag: CommandFlag): string | undefined {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null) {
      return undefined;
    }
    return String(value);
  }

  public static readRequiredString(argv: ArgvStruct, flag: CommandFlag): string {
    const value: string | undefined = Flags.readString(argv, flag);
    if (value === undefined || value.trim().length === 0) {
      throw new IllegalArgumentError(`--${flag.name} is required`);
    }
    return value;
  }

  public static readNumber(argv: ArgvStruct, flag: CommandFlag): number | undefined {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null) {
      return undefined;
    }
    const parsed: number = Number(value);
    if (!Number.isInteger(parsed)) {
      throw new IllegalArgumentError(`--${flag.name} must be a whole number, got ${String(value)}`);
    }
    return parsed;
  }

  public static readBoolean(argv: ArgvStruct, flag: CommandFlag): boolean {
    return argv[flag.name] === true;
  }

  public static readList(argv: ArgvStruct, flag: CommandFlag): string[] {
    const value: unknown = argv[flag.name];
    if (value === undefined || value === null) {
      return [];
    }
    return Array.isArray(value) ? value.map((item: unknown): string => String(item)) : [String(value)];
  }

  /**
   * Reads a repeated `key=value` option. Only the first `=` separates, so values may contain more of them.
   */
  public static readKeyValues(argv: ArgvStruct, flag: CommandFlag): KeyValueMap {
    const result: KeyValueMap = {};
    for (const entry of Flags.readList(argv, flag)) {
      const separator: number = entry.indexOf('=');
      if (separator <= 0) {
        throw new IllegalArgumentError(`--${flag.name} expects key=value, got '${entry}'`);
      }
      result[entry.slice(0, separator).trim()] = entry.slice(separator + 1);
    }
    return result;
  }
}
