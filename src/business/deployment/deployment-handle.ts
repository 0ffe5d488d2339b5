// SPDX-License-Identifier: Apache-2.0

import {AsyncOperation, type OperationOutcome} from './async-operation.js';
import {type DeployerLogger} from '../../core/logging/deployer-logger.js';
import {IllegalStateError} from '../../core/errors/illegal-state-error.js';

export enum DeploymentPhase {
  UNRESOLVED = 'UNRESOLVED',
  CHECKING_EXISTENCE = 'CHECKING_EXISTENCE',
  CREATING = 'CREATING',
  REUSING = 'REUSING',
  CONFIGURING = 'CONFIGURING',
  STARTING = 'STARTING',
  DEPLOYED = 'DEPLOYED',
  ERROR = 'ERROR',
}

const TRANSITIONS: ReadonlyMap<DeploymentPhase, readonly DeploymentPhase[]> = new Map<
  DeploymentPhase,
  readonly DeploymentPhase[]
>([
  [DeploymentPhase.UNRESOLVED, [DeploymentPhase.CHECKING_EXISTENCE]],
  [DeploymentPhase.CHECKING_EXISTENCE, [DeploymentPhase.CREATING, DeploymentPhase.REUSING]],
  [DeploymentPhase.CREATING, [DeploymentPhase.CONFIGURING]],
  [DeploymentPhase.REUSING, [DeploymentPhase.CONFIGURING]],
  [DeploymentPhase.CONFIGURING, [DeploymentPhase.STARTING]],
  [DeploymentPhase.STARTING, [DeploymentPhase.DEPLOYED]],
  [DeploymentPhase.DEPLOYED, []],
  [DeploymentPhase.ERROR, []],
]);

/**
 * Tracks one deployment. The id is known as soon as the request is validated; the push itself finishes later and
 * reports through {@link outcome} and {@link completion}.
 */
export class DeploymentHandle {
  private currentPhase: DeploymentPhase = DeploymentPhase.UNRESOLVED;
  private operation?: AsyncOperation;

  public constructor(
    public readonly id: string,
    private readonly logger: DeployerLogger,
  ) {}

  public get phase(): DeploymentPhase {
    return this.currentPhase;
  }

  /**
   * @throws {IllegalStateError} for a move the phase graph does not allow; ERROR is reachable from every phase but
   * the terminal ones
   */
  public transition(next: DeploymentPhase): void {
    const allowed: readonly DeploymentPhase[] = TRANSITIONS.get(this.currentPhase) ?? [];
    const terminal: boolean = allowed.length === 0;
    if (!allowed.includes(next) && !(next === DeploymentPhase.ERROR && !terminal)) {
      throw new IllegalStateError(`deployment ${this.id} cannot move from ${this.currentPhase} to ${next}`);
    }
    this.logger.debug(`deployment ${this.id}: ${this.currentPhase} -> ${next}`);
    this.currentPhase = next;
  }

  /**
   * Attaches the remote work. The phase moves to DEPLOYED or ERROR when it settles.
   */
  public track(work: Promise<unknown>): void {
    this.operation = new AsyncOperation(
      `deployment of ${this.id}`,
      work.then(
        (): void => this.transition(DeploymentPhase.DEPLOYED),
        (error: unknown): never => {
          this.transition(DeploymentPhase.ERROR);
          throw error;
        },
      ),
      this.logger,
    );
  }

  public get outcome(): Promise<OperationOutcome> {
    return this.tracked().outcome;
  }

  public completion(): Promise<void> {
    return this.tracked().completion();
  }

  private tracked(): AsyncOperation {
    if (!this.operation) {
      throw new IllegalStateError(`deployment ${this.id} has not been started`);
    }
    return this.operation;
  }
}
