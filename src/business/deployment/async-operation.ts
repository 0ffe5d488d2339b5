// SPDX-License-Identifier: Apache-2.0

import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {CloudFoundryApiResponse} from '../../integration/cloud-foundry/cloud-foundry-api-response.js';

export type OperationOutcome =
  | {readonly status: 'succeeded'}
  | {readonly status: 'not-found'; readonly error: unknown}
  | {readonly status: 'failed'; readonly error: unknown};

/**
 * Result channel of work that continues after the call that started it has returned. Callers may ignore it: the
 * outcome is logged either way and nothing is left to reject unobserved.
 */
export class AsyncOperation {
  /** resolves once the work settles; never rejects */
  public readonly outcome: Promise<OperationOutcome>;

  public constructor(
    public readonly description: string,
    work: Promise<unknown>,
    logger: DeployerLogger,
  ) {
    this.outcome = work.then(
      (): OperationOutcome => {
        logger.debug(`${description} completed`);
        return {status: 'succeeded'};
      },
      (error: unknown): OperationOutcome => {
        if (CloudFoundryApiResponse.isNotFound(error)) {
          logger.warn(`${description}: resource not found`, error);
          return {status: 'not-found', error};
        }
        logger.error(`${description} failed`, error);
        return {status: 'failed', error};
      },
    );
  }

  /**
   * Resolves when the work succeeded or found nothing to act on, rejects with the failure otherwise.
   */
  public async completion(): Promise<void> {
    const outcome: OperationOutcome = await this.outcome;
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
  }
}
