// SPDX-License-Identifier: Apache-2.0

import {Lifecycle, type ClassProvider} from 'tsyringe-neo';

export class SingletonContainer {
  public readonly lifecycle: Lifecycle.Singleton = Lifecycle.Singleton;

  public constructor(
    public readonly token: symbol,
    public readonly useClass: ClassProvider<object>['useClass'],
  ) {}
}
