// SPDX-License-Identifier: Apache-2.0

import {SshExecution, type SshExecutionIo} from './ssh-execution.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';

/**
 * A builder for creating an ssh command execution.
 */
export class SshExecutionBuilder {
  private static readonly VALUE_MUST_NOT_BE_EMPTY: string = 'value must not be empty';

  /**
   * The path to the ssh executable.
   */
  private sshExecutable: string = 'ssh';

  private _host?: string;
  private _port?: number;
  private _user?: string;
  private _configFile?: string;
  private _remoteCommand?: string;

  /**
   * `-o name=value` client options.
   */
  private readonly _options: Map<string, string> = new Map();

  /**
   * Options passed through as given, after the built-in ones.
   */
  private readonly _extraOptions: string[] = [];

  private _io: SshExecutionIo = {};

  public executable(sshExecutable: string): SshExecutionBuilder {
    if (!sshExecutable) {
      throw new IllegalArgumentError('sshExecutable must not be empty');
    }
    this.sshExecutable = sshExecutable;
    return this;
  }

  public host(host: string): SshExecutionBuilder {
    if (!host) {
      throw new IllegalArgumentError('host must not be empty');
    }
    this._host = host;
    return this;
  }

  public port(port: number): SshExecutionBuilder {
    this._port = port;
    return this;
  }

  public user(user: string): SshExecutionBuilder {
    if (!user) {
      throw new IllegalArgumentError('user must not be empty');
    }
    this._user = user;
    return this;
  }

  /**
   * Uses an ssh client configuration file (`-F`).
   * @param configFile - the file to read instead of the user's configuration
   * @returns this builder
   */
  public configFile(configFile: string): SshExecutionBuilder {
    if (!configFile) {
      throw new IllegalArgumentError(SshExecutionBuilder.VALUE_MUST_NOT_BE_EMPTY);
    }
    this._configFile = configFile;
    return this;
  }

  /**
   * Adds a client option (`-o name=value`).
   * @param name - the option name
   * @param value - the option value
   * @returns this builder
   */
  public option(name: string, value: string): SshExecutionBuilder {
    if (!name || !value) {
      throw new IllegalArgumentError(SshExecutionBuilder.VALUE_MUST_NOT_BE_EMPTY, name);
    }
    this._options.set(name, value);
    return this;
  }

  /**
   * Adds options given as one whitespace separated string, e.g. `-i key -o ConnectTimeout=5`. Quoting is not
   * interpreted.
   * @param text - the options
   * @returns this builder
   */
  public extraOptions(text: string): SshExecutionBuilder {
    this._extraOptions.push(...SshExecutionBuilder.splitOptions(text));
    return this;
  }

  public remoteCommand(command: string): SshExecutionBuilder {
    if (!command) {
      throw new IllegalArgumentError('command must not be empty');
    }
    this._remoteCommand = command;
    return this;
  }

  public input(text: string): SshExecutionBuilder {
    this._io = {...this._io, input: text, inputFile: undefined};
    return this;
  }

  public inputFile(file: string, gunzip: boolean = false): SshExecutionBuilder {
    this._io = {...this._io, input: undefined, inputFile: file, gunzipInput: gunzip};
    return this;
  }

  public outputFile(file: string, gzip: boolean = false): SshExecutionBuilder {
    this._io = {...this._io, outputFile: file, gzipOutput: gzip};
    return this;
  }

  /**
   * Builds the SshExecution instance.
   * @returns the SshExecution instance
   */
  public build(): SshExecution {
    return new SshExecution(this.sshExecutable, this.buildArguments(), this._io);
  }

  /**
   * Builds the argument list, ending with `--`, the host and the remote command.
   * @returns the argument list
   */
  public buildArguments(): string[] {
    if (!this._host) {
      throw new IllegalArgumentError('host must be set');
    }
    if (!this._remoteCommand) {
      throw new IllegalArgumentError('command must be set');
    }
    const command: string[] = [];
    if (this._configFile) {
      command.push('-F', this._configFile);
    }
    if (this._port !== undefined) {
      command.push('-p', this._port.toString());
    }
    if (this._user) {
      command.push('-l', this._user);
    }
    for (const [name, value] of this._options.entries()) {
      command.push('-o', `${name}=${value}`);
    }
    command.push(...this._extraOptions, '--', this._host, this._remoteCommand);
    return command;
  }

  public static splitOptions(text: string): string[] {
    return text.split(/\s+/).filter((part): boolean => part !== '');
  }
}
