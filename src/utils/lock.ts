import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { getStateDir } from './state-dir';

let activeLockPath: string | null = null;
let cleanupRegistered = false;

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;

function cleanupLock(): void {
  if (!activeLockPath) {
    return;
  }

  try {
    if (!fs.existsSync(activeLockPath)) {
      return;
    }

    const content = fs.readFileSync(activeLockPath, 'utf8').trim();
    const pid = Number.parseInt(content, 10);
    if (!Number.isNaN(pid) && pid !== process.pid) {
      return;
    }

    fs.unlinkSync(activeLockPath);
  } catch (error) {
    process.stderr.write(
      `Failed to remove lock ${activeLockPath}: ${error instanceof Error ? error.message : String(error)}\n`,
    );
  } finally {
    activeLockPath = null;
  }
}

function registerCleanupHandler(): void {
  if (cleanupRegistered) {
    return;
  }
  process.once('exit', cleanupLock);
  cleanupRegistered = true;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errorCode(error) === 'EPERM';
  }
}

function tryCreateLockFile(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx', 0o600);
    try {
      fs.writeFileSync(fd, String(process.pid));
    } finally {
      fs.closeSync(fd);
    }
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

function readLockOwner(lockPath: string): number | null | 'missing' {
  try {
    const parsed = Number.parseInt(fs.readFileSync(lockPath, 'utf8').trim(), 10);
    return Number.isNaN(parsed) ? null : parsed;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return 'missing';
    }
    throw error;
  }
}

/**
 * One lock per watched directory, so two agents never sync the same folder.
 */
export function lockPathFor(sourceDir: string, stateDir: string): string {
  const key = crypto
    .createHash('sha1')
    .update(path.resolve(sourceDir))
    .digest('hex')
    .slice(0, 12);
  return path.join(stateDir, `lock-${key}`);
}

export function acquireLock(
  sourceDir: string,
  stateDir: string = getStateDir(),
): string {
  registerCleanupHandler();

  const lockPath = lockPathFor(sourceDir, stateDir);
  if (activeLockPath === lockPath) {
    return lockPath;
  }

  for (let attempt = 0; attempt < 3; attempt++) {
    if (tryCreateLockFile(lockPath)) {
      activeLockPath = lockPath;
      return lockPath;
    }

    const pid = readLockOwner(lockPath);
    if (pid === 'missing') {
      continue;
    }

    if (pid === process.pid) {
      activeLockPath = lockPath;
      return lockPath;
    }

    if (pid !== null && isProcessAlive(pid)) {
      throw new Error(
        `Another instance is already syncing ${path.resolve(sourceDir)} (PID: ${pid}). ` +
          `Delete ${lockPath} if the process is no longer running.`,
      );
    }

    try {
      fs.unlinkSync(lockPath);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }

  if (tryCreateLockFile(lockPath)) {
    activeLockPath = lockPath;
    return lockPath;
  }

  throw new Error(`Failed to acquire lock at ${lockPath}. Please retry.`);
}

export function releaseLock(): void {
  cleanupLock();
}
