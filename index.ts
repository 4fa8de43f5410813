#!/usr/bin/env tsx

import { config as loadDotenv } from 'dotenv';
import { helpText, parseCliArgs, readVersion } from './src/cli';
import type { CliArgs } from './src/cli';
import { loadConfig } from './src/config/config';
import { runSyncAgent } from './src/folder-sync';
import { ConfigError, formatError } from './src/utils/error-handler';
import { always, closeLogFile, configureLogFile, red } from './src/utils/logger';

const VERSION = readVersion(new URL('./package.json', import.meta.url));

function showHelp() {
  console.log(helpText(VERSION));
}

async function main() {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error: unknown) {
    console.error(red(`Error: ${formatError(error)}`));
    showHelp();
    process.exit(1);
  }

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(`yadisk-sync v${VERSION}`);
    process.exit(0);
  }

  loadDotenv();

  try {
    const config = loadConfig(args);
    configureLogFile(config.logFilePath, config.verbosity);

    always('Yandex Disk sync agent started. Press Ctrl+C to stop.');
    await runSyncAgent(config);
    closeLogFile();
    process.exit(0);
  } catch (error: unknown) {
    closeLogFile();
    if (error instanceof ConfigError) {
      console.error(red(`Configuration error: ${error.message}`));
    } else {
      console.error(red(`Error: ${formatError(error)}`));
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(red(`Error: ${formatError(error)}`));
  process.exit(1);
});
