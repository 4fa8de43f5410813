import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { bold } from './utils/logger';
import type { CliConfigArgs } from './config/config';

export interface CliArgs extends CliConfigArgs {
  help: boolean;
  version: boolean;
}

const PackageJsonSchema = z.object({ version: z.string() });

export function parseCliArgs(args: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args,
    options: {
      source: { type: 'string' },
      'cloud-folder': { type: 'string' },
      period: { type: 'string' },
      schedule: { type: 'string' },
      'log-file': { type: 'string' },
      'retry-failed': { type: 'boolean' },
      quiet: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  return {
    source: positionals[0] ?? values.source,
    cloudFolder: values['cloud-folder'],
    period: values.period,
    schedule: values.schedule,
    logFile: values['log-file'],
    retryFailed: values['retry-failed'],
    quiet: values.quiet,
    verbose: values.verbose,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}

export function readVersion(packageJsonUrl: URL): string {
  try {
    const parsed = PackageJsonSchema.safeParse(
      JSON.parse(fs.readFileSync(packageJsonUrl, 'utf8')),
    );
    return parsed.success ? parsed.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

export function helpText(version: string): string {
  return `
${bold(`yadisk-sync v${version} - Keeps a local folder mirrored to a Yandex Disk folder`)}

${bold('Usage: yadisk-sync [source-dir] [options]')}

Settings are read from the environment (or a .env file); flags override them.
The OAuth token is only read from YANDEX_TOKEN.

${bold('Options:')}
  --source=<path>         Local folder to watch (SYNC_FOLDER_PATH)
  --cloud-folder=<name>   Yandex Disk folder to mirror into (CLOUD_FOLDER_NAME)
  --period=<seconds>      Seconds between sync passes (SYNC_PERIOD)
  --schedule=<cron>       Cron expression used instead of the period (SYNC_SCHEDULE)
  --log-file=<path>       Log file, rotated at 10 MB (LOG_FILE_PATH)
  --retry-failed          Retry failed uploads and deletions next pass (RETRY_FAILED)
  --quiet                 Show only errors
  --verbose               Show per-file details
  --help, -h              Show this help message
  --version, -v           Show version information

${bold('Examples:')}
  yadisk-sync ~/Documents/synced --cloud-folder=Backup --period=60
  yadisk-sync --schedule="*/15 * * * *" --retry-failed
`;
}
