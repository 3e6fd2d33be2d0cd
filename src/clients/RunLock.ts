import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import { LockAcquisition, RunLock } from '../interfaces/RunLock';
import { Logger } from '../interfaces/Logger';
import { errorCode, formatError, toError } from '../utils/errors';

export class LockError extends Error {
  constructor(
    message: string,
    public readonly lockFile: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LockError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Whether a process with the given id is running.
 * EPERM means it exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

export interface FileRunLockOptions {
  pid?: number;
  isAlive?: (pid: number) => boolean;
  /** How long a lock file without a readable PID counts as still being written */
  unreadableGraceMs?: number;
}

const DEFAULT_UNREADABLE_GRACE_MS = 10000;
const MAX_ATTEMPTS = 5;

type LockOwner = { state: 'missing' } | { state: 'held' | 'stale'; pid: number | null };

/**
 * Run lock backed by a file holding the owner's PID.
 * A lock whose owner is no longer running is stale and gets reclaimed.
 *
 * The file is written under a private name and hard-linked into place, so it
 * never appears without its PID. Reclaiming happens under a second guard file,
 * which makes the check-remove-create sequence exclusive between contenders.
 */
export class FileRunLock implements RunLock {
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private readonly unreadableGraceMs: number;
  private readonly guardFile: string;
  private held = false;

  constructor(
    private readonly lockFile: string,
    private readonly logger: Logger,
    options: FileRunLockOptions = {}
  ) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
    this.unreadableGraceMs = options.unreadableGraceMs ?? DEFAULT_UNREADABLE_GRACE_MS;
    this.guardFile = `${lockFile}.reclaim`;
  }

  async acquire(): Promise<LockAcquisition> {
    if (this.held) {
      return { acquired: true };
    }

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      if (await this.tryCreate(this.lockFile)) {
        this.held = true;
        return { acquired: true };
      }

      const owner = await this.inspect(this.lockFile);
      if (owner.state === 'held') {
        return { acquired: false, ownerPid: owner.pid };
      }

      if (owner.state === 'stale') {
        const result = await this.reclaim();
        if (result) {
          return result;
        }
      }
    }

    throw new LockError(`Could not acquire lock file ${this.lockFile}`, this.lockFile);
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;

    try {
      const owner = await this.readPid(this.lockFile);
      if (owner === this.pid) {
        await fs.rm(this.lockFile, { force: true });
      }
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return;
      }
      this.logger.warn(`Failed to release lock file ${this.lockFile}: ${formatError(error)}`);
    }
  }

  /**
   * Replace a stale lock while holding the guard file.
   * Resolves to null when the caller should start over.
   */
  private async reclaim(): Promise<LockAcquisition | null> {
    if (!(await this.tryCreate(this.guardFile))) {
      const guardOwner = await this.inspect(this.guardFile);
      if (guardOwner.state === 'held') {
        return { acquired: false, ownerPid: guardOwner.pid };
      }
      if (guardOwner.state === 'stale') {
        await fs.rm(this.guardFile, { force: true });
      }
      return null;
    }

    try {
      // The lock may have been reclaimed before we took the guard
      const owner = await this.inspect(this.lockFile);
      if (owner.state === 'held') {
        return { acquired: false, ownerPid: owner.pid };
      }
      if (owner.state === 'stale') {
        this.logger.warn('Stale lock file found. Removing.', { lockFile: this.lockFile, ownerPid: owner.pid });
        await fs.rm(this.lockFile, { force: true });
      }

      if (await this.tryCreate(this.lockFile)) {
        this.held = true;
        return { acquired: true };
      }
      return null;
    } finally {
      await fs.rm(this.guardFile, { force: true });
    }
  }

  /**
   * Create the file with our PID only if it does not exist yet
   */
  private async tryCreate(path: string): Promise<boolean> {
    const staging = `${path}.${this.pid}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(staging, `${this.pid}\n`, { flag: 'wx' });
      await fs.link(staging, path);
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw new LockError(`Failed to create lock file ${path}: ${formatError(error)}`, this.lockFile, toError(error));
    } finally {
      await fs.rm(staging, { force: true });
    }
  }

  /**
   * Decide whether an existing lock or guard file still belongs to a live run.
   * A file without a readable PID is only stale once it is older than the grace period.
   */
  private async inspect(path: string): Promise<LockOwner> {
    try {
      const pid = await this.readPid(path);
      if (pid === null) {
        const { mtimeMs } = await fs.stat(path);
        const fresh = Date.now() - mtimeMs < this.unreadableGraceMs;
        return { state: fresh ? 'held' : 'stale', pid: null };
      }
      const live = pid !== this.pid && this.isAlive(pid);
      return { state: live ? 'held' : 'stale', pid };
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return { state: 'missing' };
      }
      throw error;
    }
  }

  /**
   * PID recorded in the file, or null when its content is not a PID
   */
  private async readPid(path: string): Promise<number | null> {
    const content = await fs.readFile(path, 'utf8');
    const pid = parseInt(content.trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  }
}
