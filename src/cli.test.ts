/**
 * Tests for CLI argument handling
 */

import { expect, describe, it, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { helpText, parseCliArgs, readVersion } from './cli';

describe('CLI', () => {
  describe('parseCliArgs', () => {
    it('should parse all CLI options correctly', () => {
      const args = parseCliArgs([
        '--source=/home/user/Documents',
        '--cloud-folder=Backup',
        '--period=120',
        '--schedule=*/5 * * * *',
        '--log-file=/var/log/yadisk-sync.log',
        '--retry-failed',
        '--verbose',
      ]);

      expect(args).toEqual({
        source: '/home/user/Documents',
        cloudFolder: 'Backup',
        period: '120',
        schedule: '*/5 * * * *',
        logFile: '/var/log/yadisk-sync.log',
        retryFailed: true,
        quiet: undefined,
        verbose: true,
        help: false,
        version: false,
      });
    });

    it('should take the source folder as a positional argument', () => {
      const args = parseCliArgs(['/mnt/disk/Photos', '--source=/ignored']);

      expect(args.source).toBe('/mnt/disk/Photos');
    });

    it('should leave unset flags undefined so the environment applies', () => {
      const args = parseCliArgs([]);

      expect(args.source).toBeUndefined();
      expect(args.cloudFolder).toBeUndefined();
      expect(args.period).toBeUndefined();
      expect(args.retryFailed).toBeUndefined();
    });

    it('should support short help and version flags', () => {
      expect(parseCliArgs(['-h']).help).toBe(true);
      expect(parseCliArgs(['-v']).version).toBe(true);
    });

    it('should reject unknown options', () => {
      expect(() => parseCliArgs(['--target=/backup'])).toThrow();
    });
  });

  describe('readVersion', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'yadisk-sync-cli-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should read the version from package.json', () => {
      const file = path.join(tempDir, 'package.json');
      fs.writeFileSync(file, JSON.stringify({ name: 'demo', version: '2.3.4' }));

      expect(readVersion(pathToFileURL(file))).toBe('2.3.4');
    });

    it('should fall back to unknown when the file is missing or malformed', () => {
      const malformed = path.join(tempDir, 'package.json');
      fs.writeFileSync(malformed, '{ not json');

      expect(readVersion(pathToFileURL(malformed))).toBe('unknown');
      expect(readVersion(pathToFileURL(path.join(tempDir, 'none.json')))).toBe(
        'unknown',
      );
    });
  });

  describe('helpText', () => {
    it('should document every option with its environment variable', () => {
      const text = helpText('1.0.0');

      expect(text).toContain('yadisk-sync v1.0.0');
      expect(text).toContain('--cloud-folder=<name>   Yandex Disk folder to mirror into (CLOUD_FOLDER_NAME)');
      expect(text).toContain('--retry-failed          Retry failed uploads and deletions next pass (RETRY_FAILED)');
    });
  });
});
