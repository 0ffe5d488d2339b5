// SPDX-License-Identifier: Apache-2.0

import {type DeployerLogger} from '../../src/core/logging/deployer-logger.js';

export type RecordedLevel = 'error' | 'warn' | 'info' | 'debug' | 'user' | 'userError';

export interface RecordedEntry {
  level: RecordedLevel;
  message: string;
}

/**
 * Keeps every record in memory instead of printing it.
 */
export class TestLogger implements DeployerLogger {
  public readonly entries: RecordedEntry[] = [];
  public developmentMode: boolean = false;
  public traceIds: number = 0;

  public nextTraceId(): void {
    this.traceIds += 1;
  }

  public setDevMode(developmentMode: boolean): void {
    this.developmentMode = developmentMode;
  }

  public showUser(message: string): void {
    this.entries.push({level: 'user', message});
  }

  public showUserError(error: unknown): void {
    this.entries.push({level: 'userError', message: error instanceof Error ? error.message : String(error)});
  }

  public showList(title: string, items: string[]): void {
    this.entries.push({level: 'user', message: title});
    for (const item of items) {
      this.entries.push({level: 'user', message: ` - ${item}`});
    }
  }

  public error(message: unknown): void {
    this.entries.push({level: 'error', message: String(message)});
  }

  public warn(message: unknown): void {
    this.entries.push({level: 'warn', message: String(message)});
  }

  public info(message: unknown): void {
    this.entries.push({level: 'info', message: String(message)});
  }

  public debug(message: unknown): void {
    this.entries.push({level: 'debug', message: String(message)});
  }

  public messages(level: RecordedLevel): string[] {
    return this.entries
      .filter((entry: RecordedEntry): boolean => entry.level === level)
      .map((entry: RecordedEntry): string => entry.message);
  }
}
