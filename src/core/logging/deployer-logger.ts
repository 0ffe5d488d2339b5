// SPDX-License-Identifier: Apache-2.0

export interface DeployerLogger {
  /**
   * Starts a new correlation id; every record logged afterwards carries it.
   */
  nextTraceId(): void;

  setDevMode(developmentMode: boolean): void;

  /**
   * Prints to the console for the operator, and mirrors the line into the log at info level.
   */
  showUser(message: string, ...arguments_: unknown[]): void;

  /**
   * Prints an error and its chain of causes to the console, and logs it at error level.
   */
  showUserError(error: unknown): void;

  showList(title: string, items: string[]): void;

  error(message: unknown, ...arguments_: unknown[]): void;

  warn(message: unknown, ...arguments_: unknown[]): void;

  info(message: unknown, ...arguments_: unknown[]): void;

  debug(message: unknown, ...arguments_: unknown[]): void;
}
