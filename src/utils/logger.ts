import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { Verbosity } from '../interfaces/logger';
import type { LogFileOptions, LogLevel } from '../interfaces/logger';

export { Verbosity };

const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;
const DEFAULT_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const blue = (text: string): string => chalk.blue(text);
export const bold = (text: string): string => chalk.bold(text);

interface LogFileSink {
  filePath: string;
  maxBytes: number;
  retentionMs: number;
  size: number;
  logVerbose: boolean;
}

let sink: LogFileSink | null = null;

const pad = (value: number): string => String(value).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  date: Date = new Date(),
): string {
  return `${formatTimestamp(date)} | ${level} | ${message.trim()}\n`;
}

function rotatedPathFor(filePath: string, date: Date): string {
  const stamp = date.toISOString().replace(/[:.]/g, '-');
  let candidate = `${filePath}.${stamp}`;
  let counter = 1;
  while (fs.existsSync(candidate)) {
    candidate = `${filePath}.${stamp}.${counter}`;
    counter++;
  }
  return candidate;
}

/**
 * True for the log file itself and for any file rotated out of it.
 */
export function isLogFileOrRotation(logFilePath: string, candidate: string): boolean {
  const logPath = path.resolve(logFilePath);
  const candidatePath = path.resolve(candidate);
  if (candidatePath === logPath) {
    return true;
  }
  return (
    path.dirname(candidatePath) === path.dirname(logPath) &&
    path.basename(candidatePath).startsWith(`${path.basename(logPath)}.`)
  );
}

function pruneRotatedFiles(active: LogFileSink, now: number): void {
  const dir = path.dirname(active.filePath);
  const prefix = `${path.basename(active.filePath)}.`;

  for (const entry of fs.readdirSync(dir)) {
    if (!entry.startsWith(prefix)) {
      continue;
    }
    const rotatedPath = path.join(dir, entry);
    if (now - fs.statSync(rotatedPath).mtimeMs > active.retentionMs) {
      fs.unlinkSync(rotatedPath);
    }
  }
}

function rotate(active: LogFileSink): void {
  const now = new Date();
  fs.renameSync(active.filePath, rotatedPathFor(active.filePath, now));
  active.size = 0;
  pruneRotatedFiles(active, now.getTime());
}

function writeToFile(level: LogLevel, message: string): void {
  if (!sink) {
    return;
  }

  const line = formatLogLine(level, message);
  const bytes = Buffer.byteLength(line);

  try {
    if (sink.size > 0 && sink.size + bytes > sink.maxBytes) {
      rotate(sink);
    }
    fs.appendFileSync(sink.filePath, line, 'utf8');
    sink.size += bytes;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    process.stderr.write(
      `Failed to write log file ${sink.filePath}: ${errorMessage}\n`,
    );
  }
}

/**
 * Mirrors every message at info level and above into `filePath`.
 * Verbose messages are mirrored only when `verbosity` is Verbose.
 */
export function configureLogFile(
  filePath: string,
  verbosity: number = Verbosity.Normal,
  options: LogFileOptions = {},
): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;

  sink = {
    filePath,
    maxBytes: options.maxBytes ?? DEFAULT_MAX_BYTES,
    retentionMs: options.retentionMs ?? DEFAULT_RETENTION_MS,
    size,
    logVerbose: verbosity >= Verbosity.Verbose,
  };
}

export function closeLogFile(): void {
  sink = null;
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
): void {
  if (currentVerbosity >= level) {
    const formattedMessage = message.endsWith('\n') ? message : message + '\n';
    process.stdout.write(formattedMessage);
  }
}

export function error(message: string): void {
  writeToFile('ERROR', message);
  process.stdout.write(red(`❌ ${message}`) + '\n');
}

export function critical(message: string): void {
  writeToFile('CRITICAL', message);
  process.stdout.write(bold(red(`💥 ${message}`)) + '\n');
}

export function warning(message: string, currentVerbosity: number): void {
  writeToFile('WARNING', message);
  log(yellow(`⚠️ ${message}`), Verbosity.Normal, currentVerbosity);
}

export function info(message: string, currentVerbosity: number): void {
  writeToFile('INFO', message);
  log(blue(`ℹ️  ${message}`), Verbosity.Normal, currentVerbosity);
}

export function success(message: string, currentVerbosity: number): void {
  writeToFile('SUCCESS', message);
  log(green(`✅ ${message}`), Verbosity.Normal, currentVerbosity);
}

export function verbose(message: string, currentVerbosity: number): void {
  if (sink?.logVerbose) {
    writeToFile('DEBUG', message);
  }
  log(message, Verbosity.Verbose, currentVerbosity);
}

export function always(message: string): void {
  const formattedMessage = message.endsWith('\n') ? message : message + '\n';
  process.stdout.write(formattedMessage);
}
