import * as logger from './utils/logger';
import { createFileScanner } from './core/file-scanner';
import { createSyncEngine } from './core/sync/sync-engine';
import { createScheduler } from './core/scheduler/scheduler';
import { createYandexDiskService } from './core/yandex/yandex-disk-service';
import { acquireLock, releaseLock } from './utils/lock';
import type { AgentConfig } from './config/config';

export interface AgentDependencies {
  createFileScanner?: typeof createFileScanner;
  createSyncEngine?: typeof createSyncEngine;
  createScheduler?: typeof createScheduler;
  createYandexDiskService?: typeof createYandexDiskService;
  acquireLock?: (sourceDir: string) => unknown;
  releaseLock?: typeof releaseLock;
}

/**
 * Connects to Yandex Disk and keeps the folder mirrored until interrupted.
 * Setup failures reject before the first pass.
 */
export async function runSyncAgent(
  config: AgentConfig,
  dependencies: AgentDependencies = {},
): Promise<void> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;
  const makeFileScanner = dependencies.createFileScanner ?? createFileScanner;
  const makeSyncEngine = dependencies.createSyncEngine ?? createSyncEngine;
  const makeScheduler = dependencies.createScheduler ?? createScheduler;
  const makeYandexDiskService =
    dependencies.createYandexDiskService ?? createYandexDiskService;
  const { verbosity } = config;

  lock(config.syncFolderPath);
  try {
    logger.info('Connecting to Yandex Disk...', verbosity);
    const remote = makeYandexDiskService({
      token: config.yandexToken,
      cloudFolder: config.cloudFolderName,
      verbosity,
    });
    await remote.connect();
    logger.success(
      `Connected to Yandex Disk, cloud folder: ${config.cloudFolderName}`,
      verbosity,
    );

    const scanner = makeFileScanner(config.syncFolderPath, {
      verbosity,
      isExcluded: (fullPath) =>
        logger.isLogFileOrRotation(config.logFilePath, fullPath),
    });
    const engine = makeSyncEngine({
      scanner,
      remote,
      verbosity,
      retryFailed: config.retryFailed,
    });
    const scheduler = makeScheduler(engine, { verbosity });

    logger.info(
      `Synchronizing ${config.syncFolderPath} to ${config.cloudFolderName}`,
      verbosity,
    );
    await scheduler.startDaemon({
      periodSeconds: config.syncPeriod,
      schedule: config.schedule,
    });
  } finally {
    unlock();
  }
}
