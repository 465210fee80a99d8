import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { RunLockedError } from '../errors.js';
import {
  acquireLock,
  isLockStale,
  isProcessAlive,
  readLock,
  releaseLock,
  type LockInfo,
} from './lock.js';

/** A PID far above any default pid_max, never alive */
const DEAD_PID = 2 ** 22 + 12345;

describe('storage/lock', () => {
  let tempDir: string;
  let lockPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lock-test-'));
    lockPath = path.join(tempDir, 'run-1', 'writer.lock');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function lockInfo(overrides: Partial<LockInfo> = {}): LockInfo {
    return {
      pid: process.pid,
      hostname: os.hostname(),
      token: 'other-token',
      acquiredAt: new Date().toISOString(),
      runId: 'run-1',
      ...overrides,
    };
  }

  describe('isProcessAlive', () => {
    it('reports the current process as alive', () => {
      expect(isProcessAlive(process.pid)).toBe(true);
    });

    it('reports an unused pid as dead', () => {
      expect(isProcessAlive(DEAD_PID)).toBe(false);
    });
  });

  describe('isLockStale', () => {
    it('is stale when the holder on this host is gone', () => {
      expect(isLockStale(lockInfo({ pid: DEAD_PID }))).toBe(true);
    });

    it('is not stale while the holder lives', () => {
      expect(isLockStale(lockInfo())).toBe(false);
    });

    it('never treats a lock from another host as stale', () => {
      expect(isLockStale(lockInfo({ pid: DEAD_PID, hostname: 'some-other-host.invalid' }))).toBe(
        false
      );
    });
  });

  describe('acquireLock', () => {
    it('creates the lock file with holder details', async () => {
      const info = await acquireLock(lockPath, 'run-1');

      expect(info.pid).toBe(process.pid);
      expect(info.runId).toBe('run-1');
      expect(await readLock(lockPath)).toEqual(info);
    });

    it('refuses while a live writer holds the lock', async () => {
      await acquireLock(lockPath, 'run-1');

      await expect(acquireLock(lockPath, 'run-1')).rejects.toBeInstanceOf(RunLockedError);
    });

    it('reclaims a lock whose holder has died', async () => {
      await fs.mkdir(path.dirname(lockPath), { recursive: true });
      await fs.writeFile(lockPath, JSON.stringify(lockInfo({ pid: DEAD_PID })));

      const info = await acquireLock(lockPath, 'run-1');
      expect(info.pid).toBe(process.pid);
    });

    it('reclaims a corrupt lock file', async () => {
      await fs.mkdir(path.dirname(lockPath), { recursive: true });
      await fs.writeFile(lockPath, '{"pid": 12');

      const info = await acquireLock(lockPath, 'run-1');
      expect(info.token).not.toBe('');
    });
  });

  describe('readLock', () => {
    it('returns null without a lock file', async () => {
      expect(await readLock(lockPath)).toBeNull();
    });

    it('returns corrupt for unparseable content', async () => {
      await fs.mkdir(path.dirname(lockPath), { recursive: true });
      await fs.writeFile(lockPath, 'garbage');
      expect(await readLock(lockPath)).toBe('corrupt');
    });

    it('returns corrupt when fields are missing', async () => {
      await fs.mkdir(path.dirname(lockPath), { recursive: true });
      await fs.writeFile(lockPath, JSON.stringify({ pid: 1 }));
      expect(await readLock(lockPath)).toBe('corrupt');
    });
  });

  describe('releaseLock', () => {
    it('removes the lock when the token matches', async () => {
      const info = await acquireLock(lockPath, 'run-1');

      expect(await releaseLock(lockPath, info.token)).toBe(true);
      expect(await readLock(lockPath)).toBeNull();
    });

    it('leaves a lock held under another token', async () => {
      await acquireLock(lockPath, 'run-1');

      expect(await releaseLock(lockPath, 'not-ours')).toBe(false);
      expect(await readLock(lockPath)).not.toBeNull();
    });

    it('is a no-op without a lock file', async () => {
      expect(await releaseLock(lockPath, 'anything')).toBe(false);
    });
  });
});
