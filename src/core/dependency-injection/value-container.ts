// SPDX-License-Identifier: Apache-2.0

export class ValueContainer {
  public constructor(
    public token: symbol,
    public useValue: unknown,
  ) {}
}
