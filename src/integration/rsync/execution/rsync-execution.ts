// SPDX-License-Identifier: Apache-2.0

import {spawn, type ChildProcessWithoutNullStreams} from 'node:child_process';
import {RsyncExecutionException} from '../errors/rsync-execution-exception.js';

/**
 * Represents one run of rsync.
 */
export class RsyncExecution {
  private readonly output: string[] = [];
  private readonly errOutput: string[] = [];
  private exitCodeValue: number | null = null;

  public constructor(
    private readonly executable: string,
    private readonly arguments_: string[],
  ) {}

  /**
   * Runs the transfer to completion.
   * @throws RsyncExecutionException when rsync exits non-zero or cannot be started
   */
  public async call(): Promise<void> {
    const child: ChildProcessWithoutNullStreams = spawn(this.executable, this.arguments_);
    child.stdin.end();
    child.stdout.on('data', (d: Buffer): void => {
      this.collect(this.output, d);
    });
    child.stderr.on('data', (d: Buffer): void => {
      this.collect(this.errOutput, d);
    });

    const code: number = await new Promise<number>((resolve, reject): void => {
      child.on('error', (error: Error): void => {
        reject(new RsyncExecutionException(127, `Unable to start ${this.executable}`, '', error));
      });
      child.on('close', (exitCode: number | null): void => resolve(exitCode ?? 1));
    });

    this.exitCodeValue = code;
    if (code !== 0) {
      throw new RsyncExecutionException(
        code,
        `Process exited with code ${code}: ${this.standardError()}`,
        this.standardError(),
      );
    }
  }

  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  public standardOutput(): string {
    return this.output.join('\n');
  }

  public standardError(): string {
    return this.errOutput.join('\n');
  }

  private collect(lines: string[], d: Buffer): void {
    for (const item of d.toString().split(/\r?\n/)) {
      if (item) {
        lines.push(item.trim());
      }
    }
  }
}
