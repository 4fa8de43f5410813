/**
 * Tests for folder-sync.ts
 */

import { expect, describe, it, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runSyncAgent } from './folder-sync';
import type { AgentDependencies } from './folder-sync';
import type { AgentConfig } from './config/config';
import type { DaemonConfig, SchedulerOptions } from './core/scheduler/scheduler';
import type { SyncEngine } from './core/sync/sync-engine';
import type { SyncReport } from './interfaces/sync';
import type { YandexDiskServiceOptions } from './interfaces/remote-storage';
import { RemoteStorageError } from './core/remote/errors';
import { Verbosity } from './interfaces/logger';

function makeHarness(syncDir: string) {
  const events: string[] = [];
  const uploads: string[] = [];
  const serviceOptions: YandexDiskServiceOptions[] = [];
  const daemonConfigs: DaemonConfig[] = [];
  const schedulerOptions: SchedulerOptions[] = [];
  const reports: SyncReport[] = [];
  let connectError: Error | null = null;

  const dependencies: AgentDependencies = {
    acquireLock: (sourceDir) => {
      events.push(`lock ${sourceDir}`);
    },
    releaseLock: () => {
      events.push('unlock');
    },
    createYandexDiskService: (options) => {
      serviceOptions.push(options);
      return {
        connect: async () => {
          events.push('connect');
          if (connectError) {
            throw connectError;
          }
        },
        upload: async (localPath) => {
          uploads.push(path.relative(syncDir, localPath));
        },
        overwrite: async () => {},
        delete: async () => {},
        listRemote: async () => new Map(),
      };
    },
    createScheduler: (engine: Pick<SyncEngine, 'initialSync' | 'sync'>, options = {}) => {
      schedulerOptions.push(options);
      return {
        startDaemon: async (config: DaemonConfig) => {
          events.push('daemon');
          daemonConfigs.push(config);
          reports.push(await engine.initialSync());
        },
        validateCronExpression: () => true,
      };
    },
  };

  return {
    dependencies,
    events,
    uploads,
    serviceOptions,
    daemonConfigs,
    schedulerOptions,
    reports,
    failConnect: (error: Error) => {
      connectError = error;
    },
  };
}

describe('runSyncAgent', () => {
  let syncDir: string;
  let config: AgentConfig;

  beforeEach(() => {
    syncDir = fs.mkdtempSync(path.join(os.tmpdir(), 'yadisk-sync-agent-'));
    config = {
      syncFolderPath: syncDir,
      cloudFolderName: 'Backup',
      yandexToken: 'test-token',
      syncPeriod: 30,
      logFilePath: path.join(syncDir, 'sync.log'),
      retryFailed: false,
      verbosity: Verbosity.Quiet,
    };
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(syncDir, { recursive: true, force: true });
  });

  it('should connect, then hand the engine to the scheduler under the folder lock', async () => {
    const harness = makeHarness(syncDir);

    await runSyncAgent(config, harness.dependencies);

    expect(harness.events).toEqual([
      `lock ${syncDir}`,
      'connect',
      'daemon',
      'unlock',
    ]);
    expect(harness.serviceOptions).toEqual([
      { token: 'test-token', cloudFolder: 'Backup', verbosity: Verbosity.Quiet },
    ]);
    expect(harness.daemonConfigs).toEqual([
      { periodSeconds: 30, schedule: undefined },
    ]);
    expect(harness.schedulerOptions).toEqual([{ verbosity: Verbosity.Quiet }]);
  });

  it('should upload every local file except its own current and rotated logs', async () => {
    fs.writeFileSync(path.join(syncDir, 'a.txt'), 'alpha');
    fs.writeFileSync(path.join(syncDir, 'b.txt'), 'bravo');
    fs.writeFileSync(path.join(syncDir, 'sync.log'), 'log');
    fs.writeFileSync(path.join(syncDir, 'sync.log.2026-01-01T00-00-00-000Z'), 'old log');
    const harness = makeHarness(syncDir);

    await runSyncAgent(config, harness.dependencies);

    expect(harness.uploads).toEqual(['a.txt', 'b.txt']);
    expect(harness.reports[0]?.mode).toBe('initial');
    expect(harness.reports[0]?.succeeded).toBe(2);
  });

  it('should pass the cron schedule through to the scheduler', async () => {
    const harness = makeHarness(syncDir);

    await runSyncAgent(
      { ...config, schedule: '*/10 * * * *' },
      harness.dependencies,
    );

    expect(harness.daemonConfigs).toEqual([
      { periodSeconds: 30, schedule: '*/10 * * * *' },
    ]);
  });

  it('should stop before syncing and release the lock when the connection fails', async () => {
    const harness = makeHarness(syncDir);
    harness.failConnect(
      new RemoteStorageError('Cannot connect to Yandex Disk: Invalid Yandex Disk access token'),
    );

    await expect(runSyncAgent(config, harness.dependencies)).rejects.toThrow(
      'Cannot connect to Yandex Disk',
    );
    expect(harness.events).toEqual([`lock ${syncDir}`, 'connect', 'unlock']);
  });

  it('should not connect when the lock is held', async () => {
    const harness = makeHarness(syncDir);
    const dependencies: AgentDependencies = {
      ...harness.dependencies,
      acquireLock: () => {
        throw new Error('Another instance is already syncing');
      },
    };

    await expect(runSyncAgent(config, dependencies)).rejects.toThrow(
      'Another instance is already syncing',
    );
    expect(harness.events).toEqual([]);
  });
});
