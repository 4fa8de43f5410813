import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

export const STATE_DIR_NAME = '.yadisk-sync';

/**
 * Private per-user directory for lock files; created on first use.
 */
export function getStateDir(homeDir: string = os.homedir()): string {
  const dir = path.join(homeDir, STATE_DIR_NAME);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const stats = fs.statSync(dir);
  if (!stats.isDirectory()) {
    throw new Error(`State path is not a directory: ${dir}`);
  }
  fs.chmodSync(dir, 0o700);
  return dir;
}
