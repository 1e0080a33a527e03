// SPDX-License-Identifier: Apache-2.0

import {RsyncExecution} from './rsync-execution.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * A builder for creating an rsync execution.
 */
export class RsyncExecutionBuilder {
  private rsyncExecutable: string = 'rsync';

  /**
   * The flags to be passed to rsync.
   */
  private readonly _flags: string[] = [];

  /**
   * `--name=value` arguments.
   */
  private readonly _arguments: Map<string, string> = new Map();

  private _source?: string;
  private _destination?: string;

  public executable(rsyncExecutable: string): RsyncExecutionBuilder {
    if (!rsyncExecutable) {
      throw new IllegalArgumentError('rsyncExecutable must not be empty');
    }
    this.rsyncExecutable = rsyncExecutable;
    return this;
  }

  /**
   * Adds a flag, such as `--archive`.
   * @param flag - the flag to be added
   * @returns this builder
   */
  public flag(flag: string): RsyncExecutionBuilder {
    if (!flag) {
      throw new IllegalArgumentError('flag must not be empty');
    }
    this._flags.push(flag);
    return this;
  }

  /**
   * Adds an argument passed as `--name=value`.
   * @param name - the name of the argument
   * @param value - the value of the argument
   * @returns this builder
   */
  public argument(name: string, value: string): RsyncExecutionBuilder {
    if (!name) {
      throw new IllegalArgumentError('name must not be empty');
    }
    if (!value) {
      throw new IllegalArgumentError('value must not be empty', name);
    }
    this._arguments.set(name, value);
    return this;
  }

  public source(source: string): RsyncExecutionBuilder {
    this._source = source;
    return this;
  }

  public destination(destination: string): RsyncExecutionBuilder {
    this._destination = destination;
    return this;
  }

  public build(): RsyncExecution {
    return new RsyncExecution(this.rsyncExecutable, this.buildArguments());
  }

  public buildArguments(): string[] {
    if (!this._source || !this._destination) {
      throw new IllegalArgumentError('source and destination must be set');
    }
    const command: string[] = [...this._flags];
    for (const [key, value] of this._arguments.entries()) {
      command.push(`--${key}=${value}`);
    }
    command.push(this._source, this._destination);
    return command;
  }
}
