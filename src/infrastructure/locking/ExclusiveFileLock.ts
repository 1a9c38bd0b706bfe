import { promises as fs } from 'fs';
import { resolve } from 'path';
import { randomBytes } from 'crypto';
import { Logger } from '../../application/interfaces/Logger';
import { describeError, errorCode } from '../filesystem/errors';

const DEFAULT_STALE_AFTER_MS = 10 * 60 * 1000;

/** Lock files held by this process, whichever instance took them */
const heldLocks = new Set<string>();

interface LockSnapshot {
  content: string;
  modifiedAt: number;
}

/**
 * Advisory lock backed by a file created with O_EXCL. The file holds
 * `<pid>:<token>`; the owner refreshes its mtime while it holds the lock, so
 * a lock that has not been refreshed for `staleAfterMs` is abandoned.
 */
export class ExclusiveFileLock {
  private readonly lockPath: string;
  private owner: string | null = null;
  private heartbeat?: NodeJS.Timeout;

  constructor(
    lockPath: string,
    private readonly logger: Logger,
    private readonly staleAfterMs: number = DEFAULT_STALE_AFTER_MS
  ) {
    this.lockPath = resolve(lockPath);
  }

  /**
   * Non-blocking. Resolves to false when a live owner holds the lock.
   */
  public async tryAcquire(): Promise<boolean> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      if (await this.tryCreate()) {
        return true;
      }

      const snapshot = await ExclusiveFileLock.readSnapshot(this.lockPath);
      if (snapshot === null) {
        // Released between our create and our look; try again
        continue;
      }

      if (attempt > 1 || !this.isStale(snapshot)) {
        return false;
      }

      this.logger.warn('Breaking stale lock', { lockPath: this.lockPath });
      if (!(await this.breakStaleLock(snapshot))) {
        return false;
      }
    }

    return false;
  }

  /**
   * Bump the lock's mtime. Resolves to false when the lock is no longer ours.
   */
  public async touch(): Promise<boolean> {
    if (this.owner === null) {
      return false;
    }

    try {
      const content = await fs.readFile(this.lockPath, 'utf8');
      if (content !== this.owner) {
        this.logger.warn('Lock was taken over by another shipper', { lockPath: this.lockPath });
        return false;
      }
      const now = new Date();
      await fs.utimes(this.lockPath, now, now);
      return true;
    } catch (error) {
      this.logger.warn('Failed to refresh lock', {
        lockPath: this.lockPath,
        error: describeError(error)
      });
      return false;
    }
  }

  /**
   * Removes the lock file only while it still carries this holder's token.
   */
  public async release(): Promise<void> {
    const owner = this.owner;
    this.stopHeartbeat();
    this.owner = null;
    if (owner === null) {
      return;
    }
    heldLocks.delete(this.lockPath);

    try {
      const current = await ExclusiveFileLock.readSnapshot(this.lockPath);
      if (current === null) {
        return;
      }
      if (current.content !== owner) {
        this.logger.warn('Lock was taken over by another shipper; leaving it in place', {
          lockPath: this.lockPath
        });
        return;
      }
      await fs.rm(this.lockPath, { force: true });
    } catch (error) {
      this.logger.error('Failed to release lock', {
        lockPath: this.lockPath,
        error: describeError(error)
      });
      throw error;
    }
  }

  private async tryCreate(): Promise<boolean> {
    const owner = `${process.pid}:${randomBytes(16).toString('hex')}`;

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(this.lockPath, 'wx');
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw error;
    }

    try {
      await handle.writeFile(owner, 'utf8');
    } finally {
      await handle.close();
    }

    this.owner = owner;
    heldLocks.add(this.lockPath);
    this.startHeartbeat();
    return true;
  }

  private isStale(snapshot: LockSnapshot): boolean {
    if (Date.now() - snapshot.modifiedAt > this.staleAfterMs) {
      return true;
    }

    const pid = Number.parseInt(snapshot.content, 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      // Owner has not written its PID yet
      return false;
    }

    if (pid === process.pid) {
      // Left behind by an earlier run that had the same PID
      return !heldLocks.has(this.lockPath);
    }

    return !ExclusiveFileLock.isProcessAlive(pid);
  }

  /**
   * Moves the stale file aside under a unique name, so only one contender
   * can take it. If what was moved is no longer the file judged stale, a new
   * owner got there first and its lock is put back.
   */
  private async breakStaleLock(stale: LockSnapshot): Promise<boolean> {
    const aside = `${this.lockPath}.${randomBytes(8).toString('hex')}.stale`;

    try {
      await fs.rename(this.lockPath, aside);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return true;
      }
      throw error;
    }

    try {
      const moved = await ExclusiveFileLock.readSnapshot(aside);
      if (
        moved !== null &&
        (moved.content !== stale.content || moved.modifiedAt !== stale.modifiedAt)
      ) {
        await this.restore(aside);
        return false;
      }
      return true;
    } finally {
      await fs.rm(aside, { force: true });
    }
  }

  private async restore(aside: string): Promise<void> {
    try {
      await fs.link(aside, this.lockPath);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
      this.logger.warn('Could not restore a lock taken by another shipper', {
        lockPath: this.lockPath
      });
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    const interval = Math.max(1000, Math.floor(this.staleAfterMs / 3));
    this.heartbeat = setInterval(() => {
      void this.touch();
    }, interval);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
  }

  private static async readSnapshot(path: string): Promise<LockSnapshot | null> {
    try {
      const content = await fs.readFile(path, 'utf8');
      const { mtimeMs } = await fs.stat(path);
      return { content, modifiedAt: mtimeMs };
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  private static isProcessAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return errorCode(error) === 'EPERM';
    }
  }
}
