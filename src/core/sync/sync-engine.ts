import * as logger from '../../utils/logger';
import { formatError } from '../../utils/error-handler';
import { RemoteNotFoundError } from '../remote/errors';
import { diffSnapshots } from './snapshot-diff';
import type { Snapshot, SnapshotSource } from '../../interfaces/file-scanner';
import type { RemoteStorageClient } from '../../interfaces/remote-storage';
import type {
  ActionOutcome,
  SyncAction,
  SyncMode,
  SyncReport,
} from '../../interfaces/sync';

export interface SyncEngineOptions {
  scanner: SnapshotSource;
  remote: RemoteStorageClient;
  verbosity?: number;
  /**
   * Keep failed actions out of the cache so the next cycle retries them.
   * Off by default: the cache always becomes the latest scan.
   */
  retryFailed?: boolean;
  nowFn?: () => number;
}

const FAILURE_VERBS: Record<SyncAction['kind'], string> = {
  upload: 'upload',
  overwrite: 'update',
  delete: 'delete',
};

export function createSyncEngine(options: SyncEngineOptions) {
  const { scanner, remote } = options;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const retryFailed = options.retryFailed ?? false;
  const now = options.nowFn ?? (() => Date.now());

  let cache: Snapshot = new Map();

  const execute = async (action: SyncAction): Promise<void> => {
    switch (action.kind) {
      case 'upload':
        await remote.upload(action.file.path);
        logger.success(`Uploaded new file: ${action.name}`, verbosity);
        return;
      case 'overwrite':
        await remote.overwrite(action.file.path);
        logger.success(`Updated file: ${action.name}`, verbosity);
        return;
      case 'delete':
        try {
          await remote.delete(action.name);
        } catch (error) {
          if (!(error instanceof RemoteNotFoundError)) {
            throw error;
          }
          logger.verbose(`${action.name} was already absent remotely`, verbosity);
        }
        logger.success(`Deleted from cloud: ${action.name}`, verbosity);
        return;
    }
  };

  const apply = async (action: SyncAction): Promise<ActionOutcome> => {
    try {
      await execute(action);
      return { ok: true, action };
    } catch (error) {
      const message = `Failed to ${FAILURE_VERBS[action.kind]} ${action.name}: ${formatError(error)}`;
      logger.error(message);
      return {
        ok: false,
        action,
        error: {
          kind: action.kind,
          fileName: action.name,
          message,
          cause: error,
        },
      };
    }
  };

  const countRemoteFiles = async (): Promise<number | null> => {
    try {
      const remoteFiles = await remote.listRemote();
      logger.verbose(`Remote folder holds ${remoteFiles.size} files`, verbosity);
      return remoteFiles.size;
    } catch (error) {
      logger.warning(
        `Could not list remote files: ${formatError(error)}`,
        verbosity,
      );
      return null;
    }
  };

  const nextCache = (current: Snapshot, outcomes: ActionOutcome[]): Snapshot => {
    if (!retryFailed) {
      return current;
    }

    const next = new Map(current);
    for (const outcome of outcomes) {
      if (outcome.ok) {
        continue;
      }
      const { action } = outcome;
      if (action.kind === 'upload') {
        next.delete(action.name);
      } else {
        next.set(action.name, action.previous);
      }
    }
    return next;
  };

  const runPass = async (mode: SyncMode): Promise<SyncReport> => {
    const startedAt = now();

    const current = await scanner.scan();
    const remoteFileCount = await countRemoteFiles();
    const { actions, unchanged } = diffSnapshots(cache, current);

    const outcomes: ActionOutcome[] = [];
    for (const action of actions) {
      outcomes.push(await apply(action));
    }

    cache = nextCache(current, outcomes);

    const failed = outcomes.filter((outcome) => !outcome.ok).length;
    return {
      mode,
      startedAt: new Date(startedAt),
      durationMs: now() - startedAt,
      scanned: current.size,
      unchanged: unchanged.length,
      outcomes,
      succeeded: outcomes.length - failed,
      failed,
      remoteFileCount,
    };
  };

  /**
   * Uploads every local file, starting from an empty cache.
   */
  const initialSync = async (): Promise<SyncReport> => {
    logger.info('Starting initial synchronization', verbosity);
    cache = new Map();
    const report = await runPass('initial');
    logger.info(
      `Initial synchronization finished: ${report.succeeded} uploaded, ${report.failed} failed`,
      verbosity,
    );
    return report;
  };

  const sync = async (): Promise<SyncReport> => {
    const report = await runPass('steady');
    if (report.outcomes.length > 0) {
      logger.info(
        `Sync cycle finished: ${report.succeeded} succeeded, ${report.failed} failed, ${report.unchanged} unchanged`,
        verbosity,
      );
    } else {
      logger.verbose(
        `Sync cycle finished: ${report.unchanged} files unchanged`,
        verbosity,
      );
    }
    return report;
  };

  const getCache = (): Snapshot => cache;

  return { initialSync, sync, getCache };
}

export type SyncEngine = ReturnType<typeof createSyncEngine>;
