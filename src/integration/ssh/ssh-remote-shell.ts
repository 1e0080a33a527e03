// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../../core/logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../../core/config/backup-config-runtime-state.js';
import {type BackupConfigSchema} from '../../data/schema/model/config/backup-config-schema.js';
import {type RemoteTarget} from '../../core/topology/remote-target.js';
import {type RemoteCommandOptions, type RemoteShell} from './remote-shell.js';
import {type SshExecution} from './execution/ssh-execution.js';
import {SshExecutionBuilder} from './execution/ssh-execution-builder.js';

/**
 * {@link RemoteShell} over the `ssh` client, as the configured administrative user.
 */
@injectable()
export class SshRemoteShell implements RemoteShell {
  private readonly logger: StrongboxLogger;
  private readonly configState: BackupConfigRuntimeState;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
  }

  public async exec(target: RemoteTarget, command: string, options: RemoteCommandOptions = {}): Promise<string> {
    const execution: SshExecution = this.builder(target, command, options).build();

    this.logger.info(`ssh ${target.toString()}: ${command}`);
    try {
      await execution.call();
    } catch (error) {
      this.logger.error(`ssh ${target.toString()}: '${command}' failed`, error);
      throw error;
    }
    this.logger.debug(
      `ssh ${target.toString()}: '${command}' finished\nstdout: ${execution.standardOutput()}\nstderr: ${execution.standardError()}`,
    );
    return execution.standardOutput();
  }

  public builder(target: RemoteTarget, command: string, options: RemoteCommandOptions = {}): SshExecutionBuilder {
    const config: BackupConfigSchema = this.configState.config;
    const builder: SshExecutionBuilder = new SshExecutionBuilder()
      .host(target.host)
      .port(target.port)
      .user(config.sshUser)
      .option('BatchMode', 'yes')
      .extraOptions(config.extraSshOptions)
      .remoteCommand(command);

    if (options.configFile) {
      builder.configFile(options.configFile);
    }
    if (options.inputFile) {
      builder.inputFile(options.inputFile, options.gunzipInput ?? false);
    } else if (options.input !== undefined) {
      builder.input(options.input);
    }
    if (options.outputFile) {
      builder.outputFile(options.outputFile, options.gzipOutput ?? false);
    }
    return builder;
  }
}
