// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import * as constants from '../constants.js';

export type CleanupAction = () => Promise<void> | void;

export type ExitFunction = (code: number) => void;

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Resources registered within one {@link ScopedCleanup.run} call. Actions run in reverse registration order when the
 * scope ends, whichever way it ends.
 */
export class CleanupScope {
  private readonly actions: Array<{name: string; action: CleanupAction}> = [];

  public constructor(private readonly logger: StrongboxLogger) {}

  public register(name: string, action: CleanupAction): void {
    this.actions.push({name, action});
  }

  /** Drops a registration without running it. */
  public release(name: string): void {
    const index: number = this.actions.findIndex((entry): boolean => entry.name === name);
    if (index !== -1) {
      this.actions.splice(index, 1);
    }
  }

  public has(name: string): boolean {
    return this.actions.some((entry): boolean => entry.name === name);
  }

  /** Runs every remaining action once, newest first. A failing action is logged and the rest still run. */
  public async drain(): Promise<void> {
    for (let entry = this.actions.pop(); entry; entry = this.actions.pop()) {
      const {name, action} = entry;
      try {
        await action();
        this.logger.debug(`cleanup '${name}' done`);
      } catch (error) {
        this.logger.warn(`cleanup '${name}' failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}

/**
 * Scoped acquisition of temporary resources. Registered cleanups run on success, on error and on SIGINT/SIGTERM;
 * after an interrupt the process exits with 130 once every open scope has been drained, innermost first.
 */
@injectable()
export class ScopedCleanup {
  private readonly scopes: CleanupScope[] = [];
  private readonly signalListener: (signal: NodeJS.Signals) => void;
  private readonly logger: StrongboxLogger;
  private readonly exit: ExitFunction;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.ProcessExit) exit?: ExitFunction,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.exit = patchInject(exit, InjectTokens.ProcessExit, this.constructor.name);
    this.signalListener = (signal: NodeJS.Signals): void => {
      void this.interrupt(signal);
    };
  }

  public async run<T>(body: (scope: CleanupScope) => Promise<T>): Promise<T> {
    const scope: CleanupScope = new CleanupScope(this.logger);
    this.open(scope);
    try {
      return await body(scope);
    } finally {
      await scope.drain();
      this.close(scope);
    }
  }

  public get openScopes(): number {
    return this.scopes.length;
  }

  /** Drains all open scopes, then exits with the interrupt exit code. */
  public async interrupt(signal: NodeJS.Signals): Promise<void> {
    this.logger.warn(`received ${signal}, releasing ${this.scopes.length} open scope(s)`);
    for (const scope of [...this.scopes].reverse()) {
      await scope.drain();
    }
    this.detach();
    this.scopes.length = 0;
    this.exit(constants.EXIT_CODE_INTERRUPTED);
  }

  private open(scope: CleanupScope): void {
    if (this.scopes.length === 0) {
      for (const signal of HANDLED_SIGNALS) {
        process.on(signal, this.signalListener);
      }
    }
    this.scopes.push(scope);
  }

  private close(scope: CleanupScope): void {
    const index: number = this.scopes.indexOf(scope);
    if (index !== -1) {
      this.scopes.splice(index, 1);
    }
    if (this.scopes.length === 0) {
      this.detach();
    }
  }

  private detach(): void {
    for (const signal of HANDLED_SIGNALS) {
      process.off(signal, this.signalListener);
    }
  }
}
