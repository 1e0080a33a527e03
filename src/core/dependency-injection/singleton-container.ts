// SPDX-License-Identifier: Apache-2.0

import {Lifecycle} from 'tsyringe-neo';

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type InjectableClass = new (...arguments_: any[]) => unknown;

export class SingletonContainer {
  public lifecycle: Lifecycle;

  public constructor(
    public token: symbol,
    public useClass: InjectableClass,
  ) {
    this.lifecycle = Lifecycle.Singleton;
  }
}
