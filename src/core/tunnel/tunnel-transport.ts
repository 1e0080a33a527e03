// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type RemoteCommandOptions, type RemoteShell} from '../../integration/ssh/remote-shell.js';
import {type BulkTransfer, type TransferDirection} from '../../integration/rsync/bulk-transfer.js';
import {type BackupConfigRuntimeState} from '../config/backup-config-runtime-state.js';
import {type BackupConfigSchema} from '../../data/schema/model/config/backup-config-schema.js';
import {type CleanupScope, type ScopedCleanup} from '../lifecycle/scoped-cleanup.js';
import {RemoteTarget} from '../topology/remote-target.js';
import {type ClusterNode} from '../topology/cluster-node.js';
import {TunnelConfig} from './tunnel-config.js';
import {FanOutError, type MemberFailure} from './fan-out-error.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

/** A tunnel whose configuration is on disk for the duration of {@link TunnelTransport.withTunnel}. */
export interface ActiveTunnel {
  readonly config: TunnelConfig;
  readonly configFile: string;
}

export interface TunnelTransferRequest {
  readonly direction: TransferDirection;
  readonly localPath: string;
  readonly remotePath: string;
  readonly dedupBase?: string;
  readonly deleteExtraneous?: boolean;
}

export type MemberPredicate = (member: ClusterNode) => Promise<boolean>;

export type MemberAction = (member: ClusterNode) => Promise<void>;

/**
 * Reaches internal cluster members through one externally reachable entry host.
 *
 * Two ways of visiting members: {@link firstSuccess} for data every member holds identically, stopping at the first
 * member the predicate accepts; {@link fanOut} for sharded data, where every member must succeed.
 */
@injectable()
export class TunnelTransport {
  private readonly logger: StrongboxLogger;
  private readonly remoteShell: RemoteShell;
  private readonly bulkTransfer: BulkTransfer;
  private readonly cleanup: ScopedCleanup;
  private readonly configState: BackupConfigRuntimeState;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.RemoteShell) remoteShell?: RemoteShell,
    @inject(InjectTokens.BulkTransfer) bulkTransfer?: BulkTransfer,
    @inject(InjectTokens.ScopedCleanup) cleanup?: ScopedCleanup,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.remoteShell = patchInject(remoteShell, InjectTokens.RemoteShell, this.constructor.name);
    this.bulkTransfer = patchInject(bulkTransfer, InjectTokens.BulkTransfer, this.constructor.name);
    this.cleanup = patchInject(cleanup, InjectTokens.ScopedCleanup, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
  }

  public buildTunnel(entry: RemoteTarget, members: ClusterNode[]): TunnelConfig {
    const config: BackupConfigSchema = this.configState.config;
    return TunnelConfig.build(entry, members, config.sshUser, config.extraSshOptions);
  }

  /**
   * Writes the tunnel configuration to a private temporary directory, runs `body`, and removes the directory
   * afterwards, also when `body` fails or the process is interrupted.
   */
  public async withTunnel<T>(config: TunnelConfig, body: (tunnel: ActiveTunnel) => Promise<T>): Promise<T> {
    return this.cleanup.run(async (scope: CleanupScope): Promise<T> => {
      const directory: string = fs.mkdtempSync(path.join(os.tmpdir(), 'strongbox-tunnel-'));
      scope.register('tunnel-config', (): void => {
        fs.rmSync(directory, {recursive: true, force: true});
      });
      const configFile: string = path.join(directory, 'ssh_config');
      fs.writeFileSync(configFile, config.render(), {mode: 0o600});
      this.logger.debug(`tunnel through ${config.entry.host} for ${config.rules.length} member(s) at ${configFile}`);
      return body({config, configFile});
    });
  }

  public async runOverTunnel(
    tunnel: ActiveTunnel,
    member: ClusterNode,
    command: string,
    options: RemoteCommandOptions = {},
  ): Promise<string> {
    const [target, configFile] = this.route(tunnel, member);
    return this.remoteShell.exec(target, command, {...options, configFile});
  }

  public async transferOverTunnel(
    tunnel: ActiveTunnel,
    member: ClusterNode,
    request: TunnelTransferRequest,
  ): Promise<void> {
    const [target, configFile] = this.route(tunnel, member);
    await this.bulkTransfer.transfer({...request, target, configFile});
  }

  /**
   * Visits members in order and runs `action` on the first one `predicate` accepts; no other member is acted on.
   * A predicate that throws counts as not accepting. No accepted member is a no-op.
   * @returns the member acted on, if any
   */
  public async firstSuccess(
    members: ClusterNode[],
    predicate: MemberPredicate,
    action: MemberAction,
  ): Promise<ClusterNode | undefined> {
    for (const member of members) {
      let applicable: boolean = false;
      try {
        applicable = await predicate(member);
      } catch (error) {
        this.logger.debug(`probe of ${member.hostname} failed, trying the next member`, error);
      }
      if (!applicable) {
        continue;
      }
      await action(member);
      return member;
    }
    this.logger.info('no member satisfied the probe, nothing to transfer');
    return undefined;
  }

  /**
   * Runs `action` on every member, at most `transferConcurrency` at a time. Every member is visited even after a
   * failure; a single failure is rethrown as is, several as a {@link FanOutError}.
   */
  public async fanOut(members: ClusterNode[], action: MemberAction): Promise<void> {
    const limit: number = Math.max(1, this.configState.config.transferConcurrency);
    const failures: MemberFailure[] = [];
    let next: number = 0;

    const worker = async (): Promise<void> => {
      while (next < members.length) {
        const member: ClusterNode = members[next++];
        try {
          await action(member);
        } catch (error) {
          this.logger.error(`transfer on ${member.hostname} failed`, error);
          failures.push({member, error});
        }
      }
    };
    await Promise.all(Array.from({length: Math.min(limit, members.length)}, async (): Promise<void> => worker()));

    if (failures.length === 1) {
      throw failures[0].error;
    }
    if (failures.length > 1) {
      throw new FanOutError(failures);
    }
  }

  /** Members with a proxy rule go through the tunnel; the entry host itself is reached directly. */
  private route(tunnel: ActiveTunnel, member: ClusterNode): [RemoteTarget, string | undefined] {
    if (member.hostname === tunnel.config.entry.host) {
      return [tunnel.config.entry, undefined];
    }
    if (!tunnel.config.routes(member.hostname)) {
      throw new IllegalArgumentError(`${member.hostname} is not reachable through this tunnel`, member.hostname);
    }
    return [new RemoteTarget(member.hostname, member.port), tunnel.configFile];
  }
}
