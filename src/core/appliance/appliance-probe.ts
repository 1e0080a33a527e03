// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type RemoteShell} from '../../integration/ssh/remote-shell.js';
import {type RemoteTarget} from '../topology/remote-target.js';
import {PreconditionError} from '../errors/precondition-error.js';
import {ApplianceVersion} from './appliance-version.js';
import * as constants from '../constants.js';

export interface ApplianceFacts {
  readonly version: ApplianceVersion;
  readonly isConfigured: boolean;
  readonly isCluster: boolean;
  readonly isReplica: boolean;
  readonly inMaintenance: boolean;
  readonly hasUuid: boolean;
}

/**
 * Read-only questions about a target appliance.
 */
@injectable()
export class ApplianceProbe {
  private readonly logger: StrongboxLogger;
  private readonly remoteShell: RemoteShell;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RemoteShell) remoteShell?: RemoteShell,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.remoteShell = patchInject(remoteShell, InjectTokens.RemoteShell, this.constructor.name);
  }

  /**
   * Reads the release version, which is also the reachability check.
   * @throws PreconditionError when the target cannot be reached or reports no usable version
   */
  public async version(target: RemoteTarget): Promise<ApplianceVersion> {
    let output: string;
    try {
      output = await this.remoteShell.exec(target, `cat ${constants.REMOTE_RELEASE_FILE}`);
    } catch (error) {
      throw new PreconditionError(`Unable to reach ${target.host} on port ${target.port}`, error, {
        host: target.host,
      });
    }
    try {
      return ApplianceVersion.parse(output);
    } catch (error) {
      throw new PreconditionError(`${target.host} reported no usable release version`, error);
    }
  }

  public async fileExists(target: RemoteTarget, file: string): Promise<boolean> {
    const output: string = await this.remoteShell.exec(target, `[ -e '${file}' ] && echo yes || echo no`);
    return output.trim() === 'yes';
  }

  public async probe(target: RemoteTarget): Promise<ApplianceFacts> {
    const version: ApplianceVersion = await this.version(target);
    const facts: ApplianceFacts = {
      version,
      isConfigured: await this.fileExists(target, constants.REMOTE_CONFIGURED_FILE),
      isCluster: await this.fileExists(target, constants.REMOTE_CLUSTER_FILE),
      isReplica: await this.fileExists(target, constants.REMOTE_REPLICATION_STATE_FILE),
      inMaintenance: await this.fileExists(target, constants.REMOTE_MAINTENANCE_FILE),
      hasUuid: await this.fileExists(target, constants.REMOTE_UUID_FILE),
    };
    this.logger.debug(`appliance ${target.host}: ${JSON.stringify({...facts, version: version.text})}`);
    return facts;
  }
}
