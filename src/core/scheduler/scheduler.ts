import { setTimeout as delay } from 'node:timers/promises';
import { Cron } from 'croner';
import * as logger from '../../utils/logger';
import { formatError } from '../../utils/error-handler';
import type { SyncEngine } from '../sync/sync-engine';

export type SignalName = 'SIGINT' | 'SIGTERM';

interface CronJob {
  stop: () => void;
  nextRun: () => Date | null;
}

export type CronConstructor = new (
  expression: string,
  options?: Record<string, unknown>,
  callback?: () => void | Promise<void>,
) => CronJob;

/** Longest wait a Node.js timer honors, in whole seconds. */
export const MAX_PERIOD_SECONDS = Math.floor((2 ** 31 - 1) / 1000);

/**
 * True when croner accepts `expression`.
 */
export function isValidCronExpression(
  expression: string,
  CronImpl: CronConstructor = Cron as unknown as CronConstructor,
): boolean {
  try {
    new CronImpl(expression, { maxRuns: 1, paused: true });
    return true;
  } catch {
    return false;
  }
}

export interface DaemonConfig {
  /** Seconds to wait between passes. */
  periodSeconds: number;
  /** Cron expression; replaces the fixed period when set. */
  schedule?: string;
}

export interface SchedulerOptions {
  verbosity?: number;
  cronConstructor?: CronConstructor;
  nowDateFn?: () => Date;
  registerSignalHandler?: (
    signal: SignalName,
    handler: () => void,
  ) => () => void;
  /** Resolves after `ms`, or as soon as `signal` aborts. */
  sleepFn?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const sleepUntilAborted = async (
  ms: number,
  signal: AbortSignal,
): Promise<void> => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

export function createScheduler(
  engine: Pick<SyncEngine, 'initialSync' | 'sync'>,
  options: SchedulerOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const CronImpl =
    options.cronConstructor ?? (Cron as unknown as CronConstructor);
  const nowDate = options.nowDateFn ?? (() => new Date());
  const sleep = options.sleepFn ?? sleepUntilAborted;
  const registerSignalHandler =
    options.registerSignalHandler ??
    ((signal: SignalName, handler: () => void) => {
      process.on(signal, handler);
      return () => {
        process.off(signal, handler);
      };
    });

  const validateCronExpression = (expression: string): boolean =>
    isValidCronExpression(expression, CronImpl);

  const runPass = async (pass: () => Promise<unknown>): Promise<void> => {
    try {
      await pass();
    } catch (error) {
      logger.critical(`Critical error: ${formatError(error)}`);
      throw error;
    }
  };

  const runPeriodically = async (
    periodSeconds: number,
    signal: AbortSignal,
  ): Promise<void> => {
    const periodMs = periodSeconds * 1000;
    while (!signal.aborted) {
      logger.verbose(`Next sync in ${periodSeconds}s`, verbosity);
      await sleep(periodMs, signal);
      if (signal.aborted) {
        return;
      }
      await runPass(() => engine.sync());
    }
  };

  const runOnSchedule = (
    schedule: string,
    signal: AbortSignal,
  ): Promise<void> =>
    new Promise((resolve, reject) => {
      // Settles once the running pass (if any) has finished
      let current: Promise<void> = Promise.resolve();

      const onAbort = () => {
        job.stop();
        current.then(() => resolve(), reject);
      };

      const fail = (error: unknown) => {
        job.stop();
        signal.removeEventListener('abort', onAbort);
        reject(error);
      };

      const job = new CronImpl(
        schedule,
        { name: `yadisk-sync-${schedule}`, protect: true },
        () => {
          if (signal.aborted) {
            return;
          }
          logger.verbose(
            `Scheduled sync triggered at ${nowDate().toISOString()}`,
            verbosity,
          );
          current = runPass(() => engine.sync()).catch(fail);
          return current;
        },
      );

      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      logger.info(
        `Next sync: ${job.nextRun()?.toISOString() ?? 'unknown'}`,
        verbosity,
      );
    });

  /**
   * Runs the initial sync, then steady passes until SIGINT or SIGTERM.
   * Rejects with the first error that escapes a pass.
   */
  const startDaemon = async (config: DaemonConfig): Promise<void> => {
    if (
      !config.schedule &&
      !(
        Number.isInteger(config.periodSeconds) &&
        config.periodSeconds > 0 &&
        config.periodSeconds <= MAX_PERIOD_SECONDS
      )
    ) {
      throw new Error(
        `Sync period must be a whole number of seconds between 1 and ${MAX_PERIOD_SECONDS}: ${config.periodSeconds}`,
      );
    }
    if (config.schedule && !validateCronExpression(config.schedule)) {
      throw new Error(`Invalid cron expression: ${config.schedule}`);
    }

    const controller = new AbortController();
    const shutdown = (signal: SignalName) => {
      if (controller.signal.aborted) {
        return;
      }
      logger.info(`Stopped by user (${signal})`, verbosity);
      controller.abort();
    };
    const unregister = [
      registerSignalHandler('SIGINT', () => shutdown('SIGINT')),
      registerSignalHandler('SIGTERM', () => shutdown('SIGTERM')),
    ];

    try {
      await runPass(() => engine.initialSync());
      if (controller.signal.aborted) {
        return;
      }

      if (config.schedule) {
        logger.info(`Syncing on schedule: ${config.schedule}`, verbosity);
        await runOnSchedule(config.schedule, controller.signal);
      } else {
        logger.info(`Syncing every ${config.periodSeconds}s`, verbosity);
        await runPeriodically(config.periodSeconds, controller.signal);
      }
    } finally {
      for (const stop of unregister) {
        stop();
      }
    }
  };

  return { startDaemon, validateCronExpression };
}

export type SyncScheduler = ReturnType<typeof createScheduler>;
