// SPDX-License-Identifier: Apache-2.0

import pino, {type Logger as PinoLogger, type DestinationStream} from 'pino';
import {v4 as uuidv4} from 'uuid';
// eslint-disable-next-line unicorn/import-style
import * as util from 'node:util';
import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {patchInject} from '../dependency-injection/container-helper.js';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {type DeployerLogger} from './deployer-logger.js';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Pino-based implementation of the DeployerLogger interface.
 *
 * Records are newline-delimited JSON, written to the configured log file or to stdout when no file is set.
 */
@injectable()
export class DeployerPinoLogger implements DeployerLogger {
  private readonly pinoLogger: PinoLogger;
  private traceId?: string;
  private developmentMode: boolean;
  private readonly MINOR_LINE_SEPARATOR: string =
    '-------------------------------------------------------------------------------';

  /**
   * @param logLevel - the log level to use (fatal|error|warn|info|debug|trace|silent)
   * @param developmentMode - if true, show full stack traces in error messages
   * @param logFile - file to append records to, stdout when empty
   */
  public constructor(
    @inject(InjectTokens.LogLevel) logLevel?: string,
    @inject(InjectTokens.DevelopmentMode) developmentMode?: boolean,
    @inject(InjectTokens.LogFile) logFile?: string,
  ) {
    const level: string = patchInject(logLevel, InjectTokens.LogLevel, this.constructor.name);
    this.developmentMode = patchInject(developmentMode, InjectTokens.DevelopmentMode, this.constructor.name);
    const file: string = patchInject(logFile, InjectTokens.LogFile, this.constructor.name);

    this.nextTraceId();

    const destination: DestinationStream =
      file.length > 0 ? pino.destination({dest: file, mkdir: true, sync: true}) : pino.destination(1);

    this.pinoLogger = pino(
      {
        level,
        mixin: (): {traceId?: string} => (this.traceId ? {traceId: this.traceId} : {}),
        // Redact obvious secrets if they sneak into objects
        redact: {
          paths: ['*.authorization', '*.Authorization', '*.accessToken', '*.token'],
          remove: true,
        },
      },
      destination,
    );
  }

  public setDevMode(developmentMode: boolean): void {
    this.debug(`dev mode logging: ${developmentMode}`);
    this.developmentMode = developmentMode;
  }

  public nextTraceId(): void {
    this.traceId = uuidv4();
  }

  public showUser(message: string, ...arguments_: unknown[]): void {
    console.log(util.format(message, ...arguments_));
    this.info(util.format(message, ...arguments_));
  }

  public showUserError(error: unknown): void {
    const stack: {message: string; stacktrace?: string}[] = [];
    let current: unknown = error;
    let depth: number = 0;
    while (current !== undefined && current !== null && depth < 10) {
      if (current instanceof Error) {
        stack.push({message: current.message, stacktrace: current.stack});
        current = current.cause;
      } else {
        stack.push({message: String(current)});
        current = undefined;
      }
      depth += 1;
    }

    console.log(chalk.red('*********************************** ERROR *****************************************'));
    if (this.developmentMode) {
      let prefix: string = '';
      let indent: string = '';
      for (const s of stack) {
        console.log(indent + prefix + chalk.yellow(s.message));
        if (s.stacktrace) {
          const formatted: string = s.stacktrace
            .split('\n')
            .filter((l: string): boolean => !l.includes('node:internal'))
            .join('\n')
            .trim();
          console.log(indent + chalk.gray(formatted) + '\n');
        }
        indent += '  ';
        prefix = 'Caused by: ';
      }
    } else {
      for (const line of (stack[0]?.message ?? String(error)).split('\n')) {
        console.log(chalk.yellow(line));
      }
    }
    console.log(chalk.red('***********************************************************************************'));

    this.toPino('error', error, []);
  }

  public showList(title: string, items: string[] = []): void {
    this.showUser(chalk.green(`\n *** ${title} ***`));
    this.showUser(chalk.green(this.MINOR_LINE_SEPARATOR));
    if (items.length > 0) {
      for (const name of items) {
        this.showUser(chalk.cyan(` - ${name}`));
      }
    } else {
      this.showUser(chalk.blue('[ None ]'));
    }
    this.showUser('\n');
  }

  public error(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('error', message, arguments_);
  }

  public warn(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('warn', message, arguments_);
  }

  public info(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('info', message, arguments_);
  }

  public debug(message: unknown, ...arguments_: unknown[]): void {
    this.toPino('debug', message, arguments_);
  }

  private toPino(level: LogLevel, message: unknown, arguments_: unknown[]): void {
    // Prefer structured errors/objects when provided
    if (message instanceof Error) {
      this.pinoLogger[level]({err: message}, message.message);
      return;
    }

    if (message && typeof message === 'object') {
      if (arguments_.length > 0) {
        this.pinoLogger[level](message, util.format('%s', ...arguments_));
      } else {
        this.pinoLogger[level](message);
      }
      return;
    }

    this.pinoLogger[level](util.format(message, ...arguments_));
  }
}
