// SPDX-License-Identifier: Apache-2.0

import {spawn, type ChildProcessWithoutNullStreams} from 'node:child_process';
import fs from 'node:fs';
import {pipeline} from 'node:stream/promises';
import {createGunzip, createGzip} from 'node:zlib';
import {SshExecutionException} from '../errors/ssh-execution-exception.js';

export interface SshExecutionIo {
  readonly input?: string;
  readonly inputFile?: string;
  readonly gunzipInput?: boolean;
  readonly outputFile?: string;
  readonly gzipOutput?: boolean;
}

/**
 * Represents one run of the ssh client and collects what it prints.
 */
export class SshExecution {
  /**
   * The exit code reported when the executable could not be started.
   */
  public static readonly EXIT_CODE_NOT_STARTED: number = 127;

  private readonly output: Buffer[] = [];
  private readonly errOutput: Buffer[] = [];
  private exitCodeValue: number | null = null;

  /**
   * Creates a new SshExecution instance.
   * @param executable - the program to start
   * @param arguments_ - its arguments, passed without a shell
   * @param io - where standard input comes from and where standard output goes
   * @param environmentVariables - the environment of the child process
   */
  public constructor(
    private readonly executable: string,
    private readonly arguments_: string[],
    private readonly io: SshExecutionIo = {},
    private readonly environmentVariables: Record<string, string | undefined> = process.env,
  ) {}

  /**
   * Starts the process and waits for it and for every stream attached to it.
   * @throws SshExecutionException when the process exits non-zero, cannot start, or a stream fails
   */
  public async call(): Promise<void> {
    const child: ChildProcessWithoutNullStreams = spawn(this.executable, this.arguments_, {
      env: this.environmentVariables,
    });

    const exit: Promise<number> = new Promise<number>((resolve, reject): void => {
      child.on('error', reject);
      child.on('close', (code: number | null): void => resolve(code ?? 1));
    });

    // stream failures are collected rather than thrown so that the exit code wins when both happen
    const streams: Array<Promise<unknown>> = [this.attachInput(child), this.attachOutput(child)];
    child.stderr.on('data', (chunk: Buffer): void => {
      this.errOutput.push(chunk);
    });

    let code: number;
    try {
      code = await exit;
    } catch (error) {
      this.exitCodeValue = SshExecution.EXIT_CODE_NOT_STARTED;
      throw new SshExecutionException(
        SshExecution.EXIT_CODE_NOT_STARTED,
        `Unable to start ${this.executable}`,
        '',
        '',
        error instanceof Error ? error : undefined,
      );
    }
    const streamErrors: unknown[] = (await Promise.all(streams)).filter((result): boolean => result !== undefined);

    this.exitCodeValue = code;
    if (code !== 0) {
      throw new SshExecutionException(
        code,
        `Process exited with code ${code}: ${this.standardError()}`,
        this.standardOutput(),
        this.standardError(),
      );
    }
    const [streamError] = streamErrors;
    if (streamError !== undefined) {
      throw new SshExecutionException(
        0,
        `Process exited with code 0 but a stream failed: ${streamError instanceof Error ? streamError.message : String(streamError)}`,
        this.standardOutput(),
        this.standardError(),
        streamError instanceof Error ? streamError : undefined,
      );
    }
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  public exitCode(): number | null {
    return this.exitCodeValue;
  }

  /**
   * Gets the standard output of the process, empty when it was written to a file.
   */
  public standardOutput(): string {
    return Buffer.concat(this.output).toString('utf8');
  }

  /**
   * Gets the standard error of the process, trimmed.
   */
  public standardError(): string {
    return Buffer.concat(this.errOutput).toString('utf8').trim();
  }

  /** Resolves to the stream error, or undefined when input was delivered. */
  private async attachInput(child: ChildProcessWithoutNullStreams): Promise<unknown> {
    const {inputFile, gunzipInput, input} = this.io;
    if (inputFile) {
      const source: fs.ReadStream = fs.createReadStream(inputFile);
      const delivered: Promise<void> = gunzipInput
        ? pipeline(source, createGunzip(), child.stdin)
        : pipeline(source, child.stdin);
      return delivered.then(
        (): undefined => undefined,
        (error: unknown): unknown => (SshExecution.isBrokenPipe(error) ? undefined : error),
      );
    }
    return new Promise<unknown>((resolve): void => {
      child.stdin.on('error', (error: Error): void => resolve(SshExecution.isBrokenPipe(error) ? undefined : error));
      child.stdin.end(input ?? '', (): void => resolve(undefined));
    });
  }

  /** A command that exits without reading all of its input is judged by its exit code alone. */
  private static isBrokenPipe(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'EPIPE';
  }

  /** Resolves to the stream error, or undefined once output is fully written. */
  private async attachOutput(child: ChildProcessWithoutNullStreams): Promise<unknown> {
    const {outputFile, gzipOutput} = this.io;
    if (!outputFile) {
      child.stdout.on('data', (chunk: Buffer): void => {
        this.output.push(chunk);
      });
      return undefined;
    }
    const destination: fs.WriteStream = fs.createWriteStream(outputFile);
    const written: Promise<void> = gzipOutput
      ? pipeline(child.stdout, createGzip(), destination)
      : pipeline(child.stdout, destination);
    return written.then(
      (): undefined => undefined,
      (error: unknown): unknown => error,
    );
  }
}
