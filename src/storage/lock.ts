/**
 * Run Writer Lock
 *
 * File-based exclusive lock that keeps two orchestrator processes from
 * driving the same run id (and therefore the same output root) at once.
 * The lock file is created with the exclusive `wx` flag; a lock whose
 * owner process is gone (same host, PID no longer alive) is stale and
 * may be reclaimed.
 *
 * @module storage/lock
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { RunLockedError } from '../errors.js';
import { isErrnoException } from './atomic.js';

/** Lock metadata stored in the lock file */
export const LockInfoSchema = z.object({
  /** PID of the process holding the lock */
  pid: z.number().int(),
  /** Host the holder runs on; liveness can only be checked on the same host */
  hostname: z.string(),
  /** Random token identifying this particular acquisition */
  token: z.string().min(1),
  /** When the lock was acquired */
  acquiredAt: z.string(),
  /** Run the lock protects */
  runId: z.string(),
});

export type LockInfo = z.infer<typeof LockInfoSchema>;

/** Attempts to win the create race before giving up */
const MAX_ACQUIRE_ATTEMPTS = 3;

/**
 * Check whether a PID refers to a live process on this host.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

/**
 * A lock is stale when its holder ran on this host and is no longer alive.
 * Locks from other hosts are never considered stale.
 */
export function isLockStale(info: LockInfo): boolean {
  return info.hostname === os.hostname() && !isProcessAlive(info.pid);
}

/**
 * Read the lock file.
 *
 * @returns Lock info, `null` if there is no lock, or `'corrupt'` if the
 *   file exists but cannot be parsed (e.g. holder crashed mid-write)
 */
export async function readLock(lockPath: string): Promise<LockInfo | null | 'corrupt'> {
  let content: string;
  try {
    content = await fs.readFile(lockPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  try {
    const parsed = LockInfoSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : 'corrupt';
  } catch {
    return 'corrupt';
  }
}

/**
 * Acquire the writer lock for a run.
 *
 * @param lockPath - Path of the lock file
 * @param runId - Run the lock protects
 * @returns The lock info written (keep its token to release the lock)
 * @throws RunLockedError if a live writer holds the lock
 */
export async function acquireLock(lockPath: string, runId: string): Promise<LockInfo> {
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < MAX_ACQUIRE_ATTEMPTS; attempt++) {
    const existing = await readLock(lockPath);

    if (existing !== null) {
      if (existing !== 'corrupt' && !isLockStale(existing)) {
        throw new RunLockedError(runId, existing.pid);
      }
      await fs.rm(lockPath, { force: true });
    }

    const lockInfo: LockInfo = {
      pid: process.pid,
      hostname: os.hostname(),
      token: randomUUID(),
      acquiredAt: new Date().toISOString(),
      runId,
    };

    try {
      // Exclusive create - fails if another process won the race
      await fs.writeFile(lockPath, JSON.stringify(lockInfo, null, 2), { flag: 'wx' });
      return lockInfo;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        continue;
      }
      throw error;
    }
  }

  const holder = await readLock(lockPath);
  throw new RunLockedError(runId, holder !== null && holder !== 'corrupt' ? holder.pid : -1);
}

/**
 * Release the writer lock if (and only if) it is still ours.
 *
 * @returns true if the lock file was removed
 */
export async function releaseLock(lockPath: string, token: string): Promise<boolean> {
  const existing = await readLock(lockPath);
  if (existing === null || existing === 'corrupt' || existing.token !== token) {
    return false;
  }
  await fs.rm(lockPath, { force: true });
  return true;
}
