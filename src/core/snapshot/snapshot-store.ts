// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import path from 'node:path';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type StrongboxLogger} from '../logging/strongbox-logger.js';
import {type BackupConfigRuntimeState} from '../config/backup-config-runtime-state.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {PreconditionError} from '../errors/precondition-error.js';
import {type BackupStrategy, parseBackupStrategy} from './backup-strategy.js';
import {type CommittedSnapshot, type Snapshot} from './snapshot.js';
import * as constants from '../constants.js';

export interface SnapshotLock {
  readonly id: string;
  readonly pid: number;
}

/**
 * The chain of snapshots under the data directory, plus the `current` symlink naming the newest committed one.
 *
 * A snapshot is written with an `incomplete` marker in it. {@link commit} removes the marker and then moves `current`
 * with a single rename of a freshly created symlink, so `current` never names a partially written snapshot.
 */
@injectable()
export class SnapshotStore {
  private readonly logger: StrongboxLogger;
  private readonly configState: BackupConfigRuntimeState;

  public constructor(
    @inject(InjectTokens.StrongboxLogger) logger?: StrongboxLogger,
    @inject(InjectTokens.BackupConfigRuntimeState) configState?: BackupConfigRuntimeState,
  ) {
    this.logger = patchInject(logger, InjectTokens.StrongboxLogger, this.constructor.name);
    this.configState = patchInject(configState, InjectTokens.BackupConfigRuntimeState, this.constructor.name);
  }

  public get root(): string {
    return path.resolve(this.configState.config.dataDir);
  }

  /** Allocates a new snapshot directory, marked incomplete, whose parent is the current snapshot. */
  public begin(): Snapshot {
    this.ensureRoot();
    const id: string = this.nextId();
    const snapshotPath: string = path.join(this.root, id);
    fs.mkdirSync(snapshotPath);
    fs.writeFileSync(path.join(snapshotPath, constants.SNAPSHOT_INCOMPLETE_FILE), '');
    const parentId: string | undefined = this.currentId();
    this.logger.info(`snapshot ${id} started${parentId ? `, linking against ${parentId}` : ''}`);
    return {id, path: snapshotPath, parentId, committed: false};
  }

  public committed(): boolean {
    return this.currentId() !== undefined;
  }

  /** The path of the current snapshot, used as the hard-link base of the next one. */
  public dedupBase(): string | undefined {
    const id: string | undefined = this.currentId();
    return id ? path.join(this.root, id) : undefined;
  }

  public datastorePath(snapshot: Snapshot, datastore: string): string {
    return path.join(snapshot.path, datastore);
  }

  public writeMetadata(snapshot: Snapshot, strategy: BackupStrategy, version: string): Snapshot {
    fs.writeFileSync(path.join(snapshot.path, constants.SNAPSHOT_STRATEGY_FILE), `${strategy}\n`);
    fs.writeFileSync(path.join(snapshot.path, constants.SNAPSHOT_VERSION_FILE), `${version}\n`);
    return {...snapshot, strategy, version};
  }

  public readMetadata(id: string): {strategy: BackupStrategy; version: string} {
    const snapshotPath: string = path.join(this.root, id);
    const strategyFile: string = path.join(snapshotPath, constants.SNAPSHOT_STRATEGY_FILE);
    const versionFile: string = path.join(snapshotPath, constants.SNAPSHOT_VERSION_FILE);
    if (!fs.existsSync(strategyFile) || !fs.existsSync(versionFile)) {
      throw new PreconditionError(`Snapshot ${id} has no recorded strategy or version`);
    }
    return {
      strategy: parseBackupStrategy(fs.readFileSync(strategyFile, 'utf8')),
      version: fs.readFileSync(versionFile, 'utf8').trim(),
    };
  }

  /**
   * Points `current` at the snapshot. Committing the snapshot `current` already names does nothing.
   * @throws IllegalArgumentError when metadata is missing or the snapshot was committed earlier and superseded
   */
  public commit(snapshot: Snapshot): Snapshot {
    const marker: string = path.join(snapshot.path, constants.SNAPSHOT_INCOMPLETE_FILE);
    if (!fs.existsSync(snapshot.path)) {
      throw new IllegalArgumentError(`Snapshot ${snapshot.id} does not exist`, snapshot.id);
    }
    if (!fs.existsSync(marker)) {
      if (this.currentId() === snapshot.id) {
        this.logger.debug(`snapshot ${snapshot.id} is already current`);
        return {...snapshot, committed: true};
      }
      throw new IllegalArgumentError(
        `Snapshot ${snapshot.id} was committed earlier and is no longer current`,
        snapshot.id,
      );
    }
    for (const file of [constants.SNAPSHOT_STRATEGY_FILE, constants.SNAPSHOT_VERSION_FILE]) {
      if (!fs.existsSync(path.join(snapshot.path, file))) {
        throw new IllegalArgumentError(`Snapshot ${snapshot.id} cannot be committed without its ${file} file`, file);
      }
    }

    fs.rmSync(marker);
    const temporaryLink: string = path.join(this.root, `${constants.SNAPSHOT_CURRENT_LINK}.${snapshot.id}.tmp`);
    fs.rmSync(temporaryLink, {force: true});
    fs.symlinkSync(snapshot.id, temporaryLink);
    fs.renameSync(temporaryLink, path.join(this.root, constants.SNAPSHOT_CURRENT_LINK));
    this.logger.info(`snapshot ${snapshot.id} committed`);
    return {...snapshot, committed: true};
  }

  /** Removes a partial snapshot. The current snapshot is never removed. */
  public abort(snapshot: Snapshot): void {
    if (this.currentId() === snapshot.id) {
      throw new IllegalArgumentError(`Snapshot ${snapshot.id} is current and cannot be aborted`, snapshot.id);
    }
    fs.rmSync(snapshot.path, {recursive: true, force: true});
    this.logger.warn(`snapshot ${snapshot.id} aborted and removed`);
  }

  /** All snapshots in id order. Metadata is filled in where it has been written. */
  public list(): Snapshot[] {
    if (!fs.existsSync(this.root)) {
      return [];
    }
    return this.snapshotIds().map((id): Snapshot => {
      const snapshotPath: string = path.join(this.root, id);
      const committed: boolean = !fs.existsSync(path.join(snapshotPath, constants.SNAPSHOT_INCOMPLETE_FILE));
      try {
        return {id, path: snapshotPath, committed, ...this.readMetadata(id)};
      } catch {
        return {id, path: snapshotPath, committed};
      }
    });
  }

  /**
   * Resolves `current` or a snapshot id to a committed snapshot with its metadata.
   * @throws PreconditionError when there is no such committed snapshot
   */
  public resolve(reference: string = constants.SNAPSHOT_CURRENT_LINK): CommittedSnapshot {
    const id: string | undefined = reference === constants.SNAPSHOT_CURRENT_LINK ? this.currentId() : reference;
    if (!id) {
      throw new PreconditionError(`No committed snapshot found in ${this.root}`);
    }
    if (!constants.SNAPSHOT_ID_PATTERN.test(id)) {
      throw new IllegalArgumentError(`'${id}' is not a snapshot id`, id);
    }
    const snapshotPath: string = path.join(this.root, id);
    if (!fs.existsSync(snapshotPath)) {
      throw new PreconditionError(`Snapshot ${id} does not exist in ${this.root}`);
    }
    if (fs.existsSync(path.join(snapshotPath, constants.SNAPSHOT_INCOMPLETE_FILE))) {
      throw new PreconditionError(`Snapshot ${id} is incomplete and cannot be restored`);
    }
    const {strategy, version} = this.readMetadata(id);
    return {id, path: snapshotPath, strategy, version, committed: true};
  }

  /**
   * Replaces every file of the snapshot (or of one datastore in it) that is byte-identical to the file at the same
   * relative path in the parent snapshot with a hard link to that file.
   * @returns the number of files linked
   */
  public linkUnchanged(snapshot: Snapshot, datastore?: string): number {
    if (!snapshot.parentId) {
      return 0;
    }
    const base: string = path.join(this.root, snapshot.parentId);
    const relativeRoot: string = datastore ?? '';
    let linked: number = 0;

    for (const relative of this.files(snapshot.path, relativeRoot)) {
      const file: string = path.join(snapshot.path, relative);
      const baseFile: string = path.join(base, relative);
      if (!SnapshotStore.isRegularFile(baseFile)) {
        continue;
      }
      const stat: fs.Stats = fs.statSync(file);
      const baseStat: fs.Stats = fs.statSync(baseFile);
      if (stat.ino === baseStat.ino && stat.dev === baseStat.dev) {
        continue;
      }
      if (stat.size !== baseStat.size || !SnapshotStore.sameContent(file, baseFile)) {
        continue;
      }
      const temporary: string = `${file}.link.tmp`;
      fs.linkSync(baseFile, temporary);
      fs.renameSync(temporary, file);
      linked++;
    }

    this.logger.debug(
      `linked ${linked} unchanged file(s) of ${snapshot.id}/${relativeRoot} against ${snapshot.parentId}`,
    );
    return linked;
  }

  /** Bytes of the snapshot not shared, by hard link, with its parent. */
  public uniqueBytes(snapshot: Snapshot): number {
    const base: string | undefined = snapshot.parentId ? path.join(this.root, snapshot.parentId) : undefined;
    let total: number = 0;
    for (const relative of this.files(snapshot.path, '')) {
      const stat: fs.Stats = fs.statSync(path.join(snapshot.path, relative));
      if (base) {
        const baseFile: string = path.join(base, relative);
        if (SnapshotStore.isRegularFile(baseFile)) {
          const baseStat: fs.Stats = fs.statSync(baseFile);
          if (baseStat.ino === stat.ino && baseStat.dev === stat.dev) {
            continue;
          }
        }
      }
      total += stat.size;
    }
    return total;
  }

  /**
   * Removes the oldest committed snapshots beyond `keep`, and incomplete snapshots nobody is writing.
   * The current snapshot is always kept.
   * @returns the removed snapshot ids
   */
  public prune(keep: number): string[] {
    if (!Number.isInteger(keep) || keep < 1) {
      throw new IllegalArgumentError('keep must be a positive integer', keep);
    }
    const current: string | undefined = this.currentId();
    const holder: SnapshotLock | undefined = this.lockHolder();
    const snapshots: Snapshot[] = this.list();
    const committed: Snapshot[] = snapshots.filter((snapshot): boolean => snapshot.committed);

    const removable: Snapshot[] = [
      ...committed.slice(0, Math.max(0, committed.length - keep)),
      ...snapshots.filter((snapshot): boolean => !snapshot.committed && snapshot.id !== holder?.id),
    ].filter((snapshot): boolean => snapshot.id !== current);

    for (const snapshot of removable) {
      fs.rmSync(snapshot.path, {recursive: true, force: true});
      this.logger.info(`pruned snapshot ${snapshot.id}`);
    }
    return removable.map((snapshot): string => snapshot.id).sort(SnapshotStore.compareIds);
  }

  /**
   * Records that a backup is writing `id`.
   * @throws PreconditionError when a live process already holds the lock
   */
  public lock(id: string): void {
    this.ensureRoot();
    const holder: SnapshotLock | undefined = this.lockHolder();
    if (holder) {
      throw new PreconditionError(`A backup is already in progress: snapshot ${holder.id}, pid ${holder.pid}`);
    }
    fs.writeFileSync(this.lockFile, `${id} ${process.pid}\n`);
  }

  public unlock(): void {
    fs.rmSync(this.lockFile, {force: true});
  }

  /** The lock, when held by a running process. A lock left behind by a dead process is ignored. */
  public lockHolder(): SnapshotLock | undefined {
    if (!fs.existsSync(this.lockFile)) {
      return undefined;
    }
    const [id, pidText] = fs.readFileSync(this.lockFile, 'utf8').trim().split(/\s+/);
    const pid: number = Number(pidText);
    if (!id || !Number.isInteger(pid) || !SnapshotStore.isProcessAlive(pid)) {
      this.logger.warn(`ignoring stale lock ${this.lockFile}`);
      return undefined;
    }
    return {id, pid};
  }

  public static compareIds(a: string, b: string): number {
    const [aBase, aSuffix] = a.split('-');
    const [bBase, bSuffix] = b.split('-');
    if (aBase !== bBase) {
      return aBase < bBase ? -1 : 1;
    }
    return Number(aSuffix ?? 0) - Number(bSuffix ?? 0);
  }

  /** `YYYYMMDDTHHmmss` in UTC. */
  public static formatId(date: Date): string {
    return date
      .toISOString()
      .replaceAll(/[-:]/g, '')
      .replace(/\.\d{3}Z$/, '');
  }

  private get lockFile(): string {
    return path.join(this.root, constants.SNAPSHOT_LOCK_FILE);
  }

  private currentId(): string | undefined {
    const link: string = path.join(this.root, constants.SNAPSHOT_CURRENT_LINK);
    let target: string;
    try {
      target = fs.readlinkSync(link);
    } catch {
      return undefined;
    }
    const id: string = path.basename(target);
    return fs.existsSync(path.join(this.root, id)) ? id : undefined;
  }

  private snapshotIds(): string[] {
    return fs
      .readdirSync(this.root, {withFileTypes: true})
      .filter((entry): boolean => entry.isDirectory() && constants.SNAPSHOT_ID_PATTERN.test(entry.name))
      .map((entry): string => entry.name)
      .sort(SnapshotStore.compareIds);
  }

  private nextId(): string {
    const base: string = SnapshotStore.formatId(new Date());
    let id: string = base;
    for (let suffix: number = 1; fs.existsSync(path.join(this.root, id)); suffix++) {
      id = `${base}-${suffix}`;
    }
    return id;
  }

  private ensureRoot(): void {
    if (fs.existsSync(this.root)) {
      return;
    }
    if (!this.configState.config.createDataDir) {
      throw new PreconditionError(`Data directory ${this.root} does not exist`);
    }
    fs.mkdirSync(this.root, {recursive: true});
  }

  /** Regular files below `directory/relativeRoot`, as paths relative to `directory`, markers excluded. */
  private files(directory: string, relativeRoot: string): string[] {
    const result: string[] = [];
    const start: string = path.join(directory, relativeRoot);
    if (!fs.existsSync(start)) {
      return result;
    }
    const visit = (relative: string): void => {
      for (const entry of fs.readdirSync(path.join(directory, relative), {withFileTypes: true})) {
        const child: string = path.join(relative, entry.name);
        if (entry.isDirectory()) {
          visit(child);
        } else if (entry.isFile() && child !== constants.SNAPSHOT_INCOMPLETE_FILE) {
          result.push(child);
        }
      }
    };
    visit(relativeRoot);
    return result.sort();
  }

  private static isRegularFile(file: string): boolean {
    try {
      return fs.lstatSync(file).isFile();
    } catch {
      return false;
    }
  }

  private static sameContent(left: string, right: string): boolean {
    const leftBuffer: Buffer = Buffer.alloc(constants.COMPARE_CHUNK_SIZE);
    const rightBuffer: Buffer = Buffer.alloc(constants.COMPARE_CHUNK_SIZE);
    const leftFd: number = fs.openSync(left, 'r');
    try {
      const rightFd: number = fs.openSync(right, 'r');
      try {
        for (;;) {
          const leftRead: number = fs.readSync(leftFd, leftBuffer, 0, leftBuffer.length, null);
          const rightRead: number = fs.readSync(rightFd, rightBuffer, 0, rightBuffer.length, null);
          if (leftRead !== rightRead) {
            return false;
          }
          if (leftRead === 0) {
            return true;
          }
          if (!leftBuffer.subarray(0, leftRead).equals(rightBuffer.subarray(0, rightRead))) {
            return false;
          }
        }
      } finally {
        fs.closeSync(rightFd);
      }
    } finally {
      fs.closeSync(leftFd);
    }
  }

  private static isProcessAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  }
}
