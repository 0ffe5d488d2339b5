// SPDX-License-Identifier: Apache-2.0

import {type AnyYargs, type ArgvStruct} from '../../types/aliases.js';
import {type DeployerLogger} from '../logging/deployer-logger.js';
import {type CommandDefinition} from '../../types/index.js';
import {type CommandFlags} from '../../types/flag-types.js';
import {Flags as flags} from '../../commands/flags.js';

export class Subcommand {
  public constructor(
    public readonly name: string,
    public readonly description: string,
    public readonly commandHandler: (argv: ArgvStruct) => Promise<void>,
    public readonly flags: CommandFlags,
  ) {}
}

export class CommandBuilder {
  private readonly subcommands: Subcommand[] = [];

  public constructor(
    private readonly name: string,
    private readonly description: string,
    private readonly logger: DeployerLogger,
  ) {}

  public addSubcommand(subcommand: Subcommand): CommandBuilder {
    this.subcommands.push(subcommand);
    return this;
  }

  /**
   * Adds a command definition to a yargs instance.
   */
  public static register(yargs: AnyYargs, definition: CommandDefinition): AnyYargs {
    return yargs.command(
      definition.command,
      definition.desc,
      definition.builder ?? ((y: AnyYargs): AnyYargs => y),
      definition.handler,
    );
  }

  public build(): CommandDefinition {
    const subcommands: Subcommand[] = this.subcommands;
    const logger: DeployerLogger = this.logger;
    const commandName: string = this.name;

    return {
      command: commandName,
      desc: this.description,
      builder: (yargs: AnyYargs): AnyYargs => {
        for (const subcommand of subcommands) {
          const handlerDefinition: CommandDefinition = {
            command: subcommand.name,
            desc: subcommand.description,
            builder: (y: AnyYargs): AnyYargs => {
              flags.setRequiredCommandFlags(y, ...subcommand.flags.required);
              flags.setOptionalCommandFlags(y, ...subcommand.flags.optional);
              return y;
            },
            handler: async (argv: ArgvStruct): Promise<void> => {
              const commandPath: string = `${commandName} ${subcommand.name}`;
              logger.nextTraceId();
              logger.info(`==== Running '${commandPath}' ===`);
              await subcommand.commandHandler(argv);
              logger.info(`==== Finished running '${commandPath}' ====`);
            },
          };
          CommandBuilder.register(yargs, handlerDefinition);
        }

        yargs.demandCommand(1, `Select a ${commandName} command`);
        return yargs.help();
      },
    };
  }
}
