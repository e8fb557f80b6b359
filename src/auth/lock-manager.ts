/**
 * Cross-process refresh locks.
 *
 * Each token key maps to a lock file inside a per-application lock directory.
 * Holding the lock means having created that file with O_CREAT|O_EXCL (flag
 * `wx`), which the filesystem grants to exactly one caller. The file records
 * the holder's pid and a random owner id; a lock whose pid is no longer
 * running is stale and gets reclaimed.
 */

import { randomUUID } from 'crypto';
import { link, mkdir, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { tmpdir, userInfo } from 'os';
import { join } from 'path';
import { OAuthError, errorMessage } from '../errors/oauth-error.js';
import { isErrnoException, isRecord } from '../utils/guards.js';
import logger from '../config/logger.js';

const LOCK_DIR_NAME = 'tokenwarden-locks';
const DEFAULT_RETRY_INTERVAL_MS = 50;
// A lock file without readable owner data is only trusted for this long
const UNREADABLE_LOCK_GRACE_MS = 10000;

export interface LockManagerOptions {
  /** Delay between attempts while blocking in acquireLock */
  retryIntervalMs?: number;
}

interface LockOwner {
  pid: number;
  owner: string;
}

/** A dead holder's lock file: its owner, or null when unreadable, and its inode */
interface StaleLock {
  holder: LockOwner | null;
  ino: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function userSuffix(): string {
  try {
    const info = userInfo();
    return info.uid >= 0 ? String(info.uid) : info.username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? 'unknown';
  }
}

/**
 * Replace characters that are not allowed in file names
 */
export function sanitizeLockKey(key: string): string {
  return key.replace(/[/\\:*?"<>|]/g, '_');
}

function isProcessRunning(pid: number): boolean {
  try {
    // Signal 0 checks for existence without delivering anything
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

function parseOwner(content: string): LockOwner | null {
  try {
    const parsed: unknown = JSON.parse(content);
    if (isRecord(parsed) && typeof parsed.pid === 'number' && typeof parsed.owner === 'string') {
      return { pid: parsed.pid, owner: parsed.owner };
    }
  } catch {
    // Partially written or foreign content
  }
  return null;
}

async function readOwner(path: string): Promise<LockOwner | null | 'missing'> {
  try {
    return parseOwner(await readFile(path, 'utf-8'));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return 'missing';
    throw error;
  }
}

/**
 * An acquired lock. Call release() when done; withLock() does this for you.
 */
export class RefreshLock {
  readonly path: string;
  readonly key: string;
  private owner: string;
  private released = false;

  constructor(key: string, path: string, owner: string) {
    this.key = key;
    this.path = path;
    this.owner = owner;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Idempotent. The file is removed only while it still names this owner;
   * removal failures are logged rather than thrown.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    try {
      const holder = await readOwner(this.path);
      if (holder === 'missing' || holder?.owner !== this.owner) {
        logger.warn({ key: this.key, path: this.path }, 'Lock file no longer owned at release');
        return;
      }
      await unlink(this.path);
      logger.debug({ key: this.key }, 'Refresh lock released');
    } catch (error) {
      logger.warn({ key: this.key, path: this.path, error: errorMessage(error) }, 'Failed to remove lock file');
    }
  }
}

/**
 * Manager for cross-process refresh locks
 */
export class RefreshLockManager {
  private lockDir: string;
  private retryIntervalMs: number;

  constructor(lockDir: string, options: LockManagerOptions = {}) {
    this.lockDir = lockDir;
    this.retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
  }

  /**
   * $XDG_RUNTIME_DIR when set, otherwise a per-user directory under the OS temp dir
   */
  static defaultLockDir(): string {
    const runtimeDir = process.env.XDG_RUNTIME_DIR;
    if (runtimeDir) {
      return join(runtimeDir, LOCK_DIR_NAME);
    }
    return join(tmpdir(), `${LOCK_DIR_NAME}-${userSuffix()}`);
  }

  static withDefaultDir(options?: LockManagerOptions): RefreshLockManager {
    return new RefreshLockManager(RefreshLockManager.defaultLockDir(), options);
  }

  static forApp(appName: string, options?: LockManagerOptions): RefreshLockManager {
    return new RefreshLockManager(join(RefreshLockManager.defaultLockDir(), sanitizeLockKey(appName)), options);
  }

  get directory(): string {
    return this.lockDir;
  }

  lockPath(key: string): string {
    return join(this.lockDir, `${sanitizeLockKey(key)}.lock`);
  }

  private async ensureDir(): Promise<void> {
    try {
      await mkdir(this.lockDir, { recursive: true });
    } catch (error) {
      throw OAuthError.storage(`Failed to create lock directory ${this.lockDir}: ${errorMessage(error)}`, error);
    }
  }

  private async createLockFile(key: string, path: string): Promise<RefreshLock | null> {
    const owner = randomUUID();
    const content = JSON.stringify({ pid: process.pid, owner, acquiredAt: Date.now() });
    try {
      await writeFile(path, content, { flag: 'wx', mode: 0o600 });
      return new RefreshLock(key, path, owner);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return null;
      }
      throw OAuthError.storage(`Failed to create lock file ${path}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Whether the file at path belongs to a dead holder. Also returns the
   * identity to compare against once the file has been moved aside.
   */
  private async inspect(path: string): Promise<StaleLock | 'missing' | 'live'> {
    let holder: LockOwner | null | 'missing';
    try {
      holder = await readOwner(path);
    } catch (error) {
      throw OAuthError.storage(`Failed to read lock file ${path}: ${errorMessage(error)}`, error);
    }
    if (holder === 'missing') return 'missing';

    const info = await stat(path).catch(() => null);
    if (info === null) return 'missing';
    if (holder === null) {
      return Date.now() - info.mtimeMs < UNREADABLE_LOCK_GRACE_MS ? 'live' : { holder, ino: info.ino };
    }
    return isProcessRunning(holder.pid) ? 'live' : { holder, ino: info.ino };
  }

  /**
   * Reclaimers take turns through a guard file, so the file a reclaimer
   * inspected can only disappear through its own rename.
   */
  private async withReclaimGuard(path: string, task: () => Promise<boolean>): Promise<boolean> {
    const guardPath = `${path}.reclaim`;
    try {
      await writeFile(guardPath, String(process.pid), { flag: 'wx', mode: 0o600 });
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw OAuthError.storage(`Failed to create reclaim guard ${guardPath}: ${errorMessage(error)}`, error);
      }
      // A reclaim takes milliseconds; an old guard was left by a crashed process
      const info = await stat(guardPath).catch(() => null);
      if (info !== null && Date.now() - info.mtimeMs >= UNREADABLE_LOCK_GRACE_MS) {
        await unlink(guardPath).catch(() => undefined);
        logger.warn({ path: guardPath }, 'Removed abandoned reclaim guard');
      }
      return false;
    }

    try {
      return await task();
    } finally {
      try {
        await unlink(guardPath);
      } catch (error) {
        logger.warn({ path: guardPath, error: errorMessage(error) }, 'Failed to remove reclaim guard');
      }
    }
  }

  /**
   * Move a dead holder's lock file out of the way. Returns true when the path was freed.
   */
  private async reclaimStale(path: string): Promise<boolean> {
    const seen = await this.inspect(path);
    if (seen === 'missing') return true;
    if (seen === 'live') return false;

    return this.withReclaimGuard(path, async () => {
      // Another reclaimer may have finished before we took the guard
      const stale = await this.inspect(path);
      if (stale === 'missing') return true;
      if (stale === 'live') return false;

      const stalePath = `${path}.${randomUUID()}.stale`;
      try {
        await rename(path, stalePath);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return true;
        throw OAuthError.storage(`Failed to reclaim lock file ${path}: ${errorMessage(error)}`, error);
      }

      if (!(await this.isSameLock(stalePath, stale))) {
        await this.restore(stalePath, path);
        return false;
      }

      await unlink(stalePath).catch(() => undefined);
      logger.warn({ path, stalePid: stale.holder?.pid }, 'Removed stale refresh lock');
      return true;
    });
  }

  private async isSameLock(movedPath: string, stale: StaleLock): Promise<boolean> {
    const info = await stat(movedPath).catch(() => null);
    if (info === null || info.ino !== stale.ino) return false;
    if (stale.holder === null) return true;
    const moved = await readOwner(movedPath).catch(() => null);
    return moved !== null && moved !== 'missing' && moved.owner === stale.holder.owner;
  }

  /**
   * Put back a live lock file that was moved aside by mistake
   */
  private async restore(movedPath: string, path: string): Promise<void> {
    try {
      await link(movedPath, path);
    } catch (error) {
      // The moved file stays aside; its holder's release will not touch the new one
      throw OAuthError.storage(`Lost a live lock file while reclaiming ${path}: ${errorMessage(error)}`, error);
    }
    await unlink(movedPath).catch(() => undefined);
    logger.warn({ path }, 'Restored a live refresh lock moved during reclaim');
  }

  /**
   * Single attempt. Resolves null when another holder has the lock.
   */
  async tryAcquireLock(key: string): Promise<RefreshLock | null> {
    await this.ensureDir();
    const path = this.lockPath(key);

    const lock = await this.createLockFile(key, path);
    if (lock) {
      logger.debug({ key, path }, 'Refresh lock acquired');
      return lock;
    }

    if (await this.reclaimStale(path)) {
      return this.createLockFile(key, path);
    }
    return null;
  }

  /**
   * Wait until the lock is obtainable. There is no timeout; use
   * tryAcquireLock in a loop for a bounded wait.
   */
  async acquireLock(key: string): Promise<RefreshLock> {
    for (;;) {
      const lock = await this.tryAcquireLock(key);
      if (lock) return lock;
      await sleep(this.retryIntervalMs);
    }
  }

  /**
   * Run task while holding the lock for key. The lock is released
   * whether task returns or throws.
   */
  async withLock<T>(key: string, task: (lock: RefreshLock) => Promise<T>): Promise<T> {
    const lock = await this.acquireLock(key);
    try {
      return await task(lock);
    } finally {
      await lock.release();
    }
  }
}
