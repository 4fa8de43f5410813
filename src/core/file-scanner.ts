import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../utils/logger';
import { formatError, handleError } from '../utils/error-handler';
import { computeFingerprint } from './fingerprint';
import type { FileState, Snapshot } from '../interfaces/file-scanner';

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export interface FileScannerOptions {
  verbosity?: number;
  /** Called with the absolute path of each entry; true skips it. */
  isExcluded?: (fullPath: string) => boolean;
  fingerprintFn?: typeof computeFingerprint;
}

export function createFileScanner(
  sourceDir: string,
  options: FileScannerOptions = {},
) {
  const resolvedDir = path.resolve(sourceDir);
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const fingerprint = options.fingerprintFn ?? computeFingerprint;
  const isExcluded = options.isExcluded ?? (() => false);

  const listEntries = async (): Promise<string[] | null> => {
    try {
      const names = await fs.promises.readdir(resolvedDir);
      return names.sort();
    } catch (error) {
      logger.error(
        `Error accessing folder ${resolvedDir}: ${formatError(error)}`,
      );
      return null;
    }
  };

  const readFileState = async (name: string): Promise<FileState | null> => {
    const fullPath = path.join(resolvedDir, name);

    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(fullPath);
    } catch (error) {
      if (isMissing(error)) {
        logger.verbose(`Skipping ${name}: target no longer exists`, verbosity);
      } else {
        handleError(error, `Error reading file ${fullPath}`);
      }
      return null;
    }

    if (!stats.isFile()) {
      return null;
    }

    logger.verbose(`Calculating checksum for ${name}`, verbosity);
    const checksum = await fingerprint(fullPath, (error) => {
      handleError(error, `Error reading file ${fullPath}`);
    });
    if (checksum === null) {
      return null;
    }

    return {
      name,
      path: fullPath,
      fingerprint: checksum,
      size: stats.size,
      modifiedTime: stats.mtime,
    };
  };

  /**
   * Snapshot of the regular files directly inside the watched directory.
   * An unreadable directory yields an empty snapshot.
   */
  const scan = async (): Promise<Snapshot> => {
    const snapshot = new Map<string, FileState>();
    const names = await listEntries();
    if (names === null) {
      return snapshot;
    }

    for (const name of names) {
      if (isExcluded(path.join(resolvedDir, name))) {
        continue;
      }
      const state = await readFileState(name);
      if (state) {
        snapshot.set(name, state);
      }
    }

    logger.verbose(
      `Scanned ${resolvedDir}: ${snapshot.size} files`,
      verbosity,
    );
    return snapshot;
  };

  return { scan, sourceDir: resolvedDir };
}

export type FileScanner = ReturnType<typeof createFileScanner>;
