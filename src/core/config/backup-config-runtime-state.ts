// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import {plainToInstance} from 'class-transformer';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {BackupConfigSchema} from '../../data/schema/model/config/backup-config-schema.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {StrongboxError} from '../errors/strongbox-error.js';
import * as constants from '../constants.js';

type ValueKind = 'string' | 'integer' | 'boolean';

/** Config keys, the environment variable overriding each, and how its text is read. */
const CONFIG_KEYS: ReadonlyArray<{key: keyof BackupConfigSchema; environment: string; kind: ValueKind}> = [
  {key: 'hostname', environment: 'STRONGBOX_HOSTNAME', kind: 'string'},
  {key: 'dataDir', environment: 'STRONGBOX_DATA_DIR', kind: 'string'},
  {key: 'numSnapshots', environment: 'STRONGBOX_NUM_SNAPSHOTS', kind: 'integer'},
  {key: 'sshUser', environment: 'STRONGBOX_SSH_USER', kind: 'string'},
  {key: 'sshPort', environment: 'STRONGBOX_SSH_PORT', kind: 'integer'},
  {key: 'extraSshOptions', environment: 'STRONGBOX_EXTRA_SSH_OPTIONS', kind: 'string'},
  {key: 'transferConcurrency', environment: 'STRONGBOX_TRANSFER_CONCURRENCY', kind: 'integer'},
  {key: 'createDataDir', environment: 'STRONGBOX_CREATE_DATA_DIR', kind: 'boolean'},
];

export class UnloadedConfigError extends StrongboxError {}

/**
 * Holds the backup configuration for the running command: a YAML file mapped onto {@link BackupConfigSchema},
 * overlaid with `STRONGBOX_*` environment variables.
 */
@injectable()
export class BackupConfigRuntimeState {
  private _config?: BackupConfigSchema;
  private _sourceFile?: string;

  public constructor(@inject(InjectTokens.HomeDirectory) private readonly homeDirectory?: string) {
    this.homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);
  }

  /**
   * Loads the first configuration file found, in order: `explicitPath`, `$STRONGBOX_CONFIG`, `./strongbox.yaml`,
   * `<home>/strongbox.yaml`. No file at all leaves the defaults and the environment in effect.
   */
  public load(explicitPath?: string, environment: NodeJS.ProcessEnv = process.env): void {
    const candidates: string[] = [
      explicitPath,
      environment[constants.CONFIG_FILE_ENVIRONMENT_VARIABLE],
      path.resolve(constants.DEFAULT_CONFIG_FILE_NAME),
      path.join(this.homeDirectory ?? constants.STRONGBOX_HOME_DIR, constants.DEFAULT_CONFIG_FILE_NAME),
    ].filter((candidate): candidate is string => !!candidate);

    if (explicitPath && !fs.existsSync(explicitPath)) {
      throw new IllegalArgumentError(`Configuration file not found: ${explicitPath}`, explicitPath);
    }

    const file: string | undefined = candidates.find((candidate): boolean => fs.existsSync(candidate));
    let values: Record<string, unknown> = {};
    if (file) {
      values = BackupConfigRuntimeState.readFile(file);
    }

    this.apply(values, environment);
    this._sourceFile = file;
  }

  /** Maps plain values onto the schema, then lets the environment override them. */
  public apply(values: Record<string, unknown>, environment: NodeJS.ProcessEnv = {}): void {
    const merged: Record<string, unknown> = {...values};
    for (const {key, environment: variable, kind} of CONFIG_KEYS) {
      const text: string | undefined = environment[variable];
      if (text !== undefined && text !== '') {
        merged[key] = BackupConfigRuntimeState.convert(variable, text, kind);
      }
    }

    const config: BackupConfigSchema = plainToInstance(BackupConfigSchema, merged, {exposeUnsetFields: false});
    BackupConfigRuntimeState.validate(config);
    this._config = config;
  }

  public get config(): BackupConfigSchema {
    if (!this._config) {
      throw new UnloadedConfigError('Backup configuration is not loaded yet.');
    }
    return this._config;
  }

  public get sourceFile(): string | undefined {
    return this._sourceFile;
  }

  private static readFile(file: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = yaml.parse(fs.readFileSync(file, 'utf8'));
    } catch (error) {
      throw new StrongboxError(`Unable to read configuration file ${file}`, error);
    }
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new IllegalArgumentError(`Configuration file ${file} must contain a mapping`, file);
    }
    return {...parsed};
  }

  private static convert(variable: string, text: string, kind: ValueKind): string | number | boolean {
    switch (kind) {
      case 'integer': {
        const value: number = Number(text);
        if (!Number.isInteger(value)) {
          throw new IllegalArgumentError(`${variable} must be an integer`, text);
        }
        return value;
      }
      case 'boolean': {
        if (!['true', 'false'].includes(text.toLowerCase())) {
          throw new IllegalArgumentError(`${variable} must be true or false`, text);
        }
        return text.toLowerCase() === 'true';
      }
      default: {
        return text;
      }
    }
  }

  private static validate(config: BackupConfigSchema): void {
    const positive: Array<[string, number]> = [
      ['numSnapshots', config.numSnapshots],
      ['sshPort', config.sshPort],
      ['transferConcurrency', config.transferConcurrency],
    ];
    for (const [key, value] of positive) {
      if (!Number.isInteger(value) || value < 1) {
        throw new IllegalArgumentError(`${key} must be a positive integer`, value);
      }
    }
    if (typeof config.createDataDir !== 'boolean') {
      throw new IllegalArgumentError('createDataDir must be true or false', config.createDataDir);
    }
    if (!config.dataDir) {
      throw new IllegalArgumentError('dataDir must not be empty', config.dataDir);
    }
  }
}
