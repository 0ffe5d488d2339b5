// SPDX-License-Identifier: Apache-2.0

import {DeployerError} from './core/errors/deployer-error.js';
import {Flags as flags} from './commands/flags.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {container} from 'tsyringe-neo';
import {type DeployerLogger} from './core/logging/deployer-logger.js';
import {type Commands} from './commands/commands.js';
import {CommandBuilder} from './core/command-path-builders/command-builder.js';
import {type AnyYargs, type ArgvStruct} from './types/aliases.js';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';

export class ArgumentProcessor {
  public static async process(argv: string[]): Promise<void> {
    const logger: DeployerLogger = container.resolve<DeployerLogger>(InjectTokens.DeployerLogger);
    const commands: Commands = container.resolve<Commands>(InjectTokens.Commands);

    logger.debug('Initializing commands');
    const rootCmd: AnyYargs = yargs(hideBin(argv))
      .scriptName('cf-deployer')
      .usage('Usage:\n  cf-deployer <command> <subcommand> [options]')
      .alias('h', 'help');

    for (const definition of commands.getCommandDefinitions()) {
      CommandBuilder.register(rootCmd, definition);
    }

    rootCmd.strict().demandCommand(1, 'Select a command');

    rootCmd.middleware((parsed: ArgvStruct): void => {
      logger.setDevMode(flags.readBoolean(parsed, flags.devMode));
    }, false);

    // Expand the terminal width to the maximum available
    rootCmd.wrap(null);

    rootCmd.fail((message: string | undefined, error: Error | undefined): void => {
      if (message) {
        logger.showUser(message);
        rootCmd.showHelp();
        // Set exit code but don't exit immediately - allows I/O buffers to flush
        process.exitCode = 1;
        throw new DeployerError(message, error);
      }
      throw error;
    });

    logger.debug('Setting up flags');
    flags.setOptionalCommandFlags(rootCmd, flags.devMode);
    logger.debug('Parsing root command (executing the commands)');
    await rootCmd.parseAsync();
  }
}
