import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError, formatError } from '../utils/error-handler';
import {
  isValidCronExpression,
  MAX_PERIOD_SECONDS,
} from '../core/scheduler/scheduler';
import { Verbosity } from '../interfaces/logger';

/** Values taken from the command line; each overrides its environment variable. */
export interface CliConfigArgs {
  source?: string;
  cloudFolder?: string;
  period?: string;
  schedule?: string;
  logFile?: string;
  retryFailed?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface AgentConfig {
  syncFolderPath: string;
  cloudFolderName: string;
  yandexToken: string;
  /** Seconds between passes. */
  syncPeriod: number;
  logFilePath: string;
  schedule?: string;
  retryFailed: boolean;
  verbosity: Verbosity;
}

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const FLAG_VALUES = ['true', 'false', '1', '0', 'yes', 'no'] as const;
const TRUTHY: ReadonlySet<string> = new Set(['true', '1', 'yes']);

const ConfigSchema = z.object({
  syncFolderPath: required('SYNC_FOLDER_PATH'),
  cloudFolderName: required('CLOUD_FOLDER_NAME'),
  yandexToken: required('YANDEX_TOKEN'),
  syncPeriod: required('SYNC_PERIOD')
    .refine(
      (value) => /^\d+$/.test(value) && Number(value) > 0,
      'SYNC_PERIOD must be a positive whole number of seconds',
    )
    .refine(
      (value) => !/^\d+$/.test(value) || Number(value) <= MAX_PERIOD_SECONDS,
      `SYNC_PERIOD must be at most ${MAX_PERIOD_SECONDS} seconds`,
    )
    .transform(Number),
  logFilePath: required('LOG_FILE_PATH'),
  schedule: z
    .string()
    .trim()
    .min(1)
    .refine((expression) => isValidCronExpression(expression), (expression) => ({
      message: `SYNC_SCHEDULE is not a valid cron expression: ${expression}`,
    }))
    .optional(),
  retryFailed: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(
      z.enum(FLAG_VALUES, {
        errorMap: () => ({ message: 'RETRY_FAILED must be true or false' }),
      }),
    )
    .transform((value) => TRUTHY.has(value))
    .default('false'),
});

const resolveVerbosity = (args: CliConfigArgs): Verbosity => {
  if (args.quiet) {
    return Verbosity.Quiet;
  }
  return args.verbose ? Verbosity.Verbose : Verbosity.Normal;
};

const checkSyncFolder = (folder: string): string | null => {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(folder);
  } catch {
    return `Sync folder does not exist: ${folder}`;
  }
  return stats.isDirectory() ? null : `Sync folder is not a directory: ${folder}`;
};

const ensureLogDirectory = (logFilePath: string): string | null => {
  const dir = path.dirname(logFilePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
    return null;
  } catch (error) {
    return `Cannot create log directory ${dir}: ${formatError(error)}`;
  }
};

/**
 * Builds the agent settings from CLI flags and the environment.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(
  args: CliConfigArgs = {},
  env: NodeJS.ProcessEnv = process.env,
): AgentConfig {
  const parsed = ConfigSchema.safeParse({
    syncFolderPath: args.source ?? env.SYNC_FOLDER_PATH,
    cloudFolderName: args.cloudFolder ?? env.CLOUD_FOLDER_NAME,
    yandexToken: env.YANDEX_TOKEN,
    syncPeriod: args.period ?? env.SYNC_PERIOD,
    logFilePath: args.logFile ?? env.LOG_FILE_PATH,
    schedule: args.schedule ?? (env.SYNC_SCHEDULE || undefined),
    retryFailed: args.retryFailed ? 'true' : env.RETRY_FAILED || undefined,
  });

  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => issue.message),
    );
  }

  const syncFolderPath = path.resolve(parsed.data.syncFolderPath);
  const logFilePath = path.resolve(parsed.data.logFilePath);
  const issues = [
    checkSyncFolder(syncFolderPath),
    ensureLogDirectory(logFilePath),
  ].filter((issue): issue is string => issue !== null);

  if (issues.length > 0) {
    throw new ConfigError('Invalid configuration', issues);
  }

  return {
    syncFolderPath,
    cloudFolderName: parsed.data.cloudFolderName,
    yandexToken: parsed.data.yandexToken,
    syncPeriod: parsed.data.syncPeriod,
    logFilePath,
    schedule: parsed.data.schedule,
    retryFailed: parsed.data.retryFailed,
    verbosity: resolveVerbosity(args),
  };
}
