import fs from 'node:fs';
import crypto from 'node:crypto';

export const FINGERPRINT_CHUNK_SIZE = 64 * 1024;

/**
 * MD5 of the whole file, streamed in fixed-size chunks.
 */
export function calculateChecksum(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('md5');
    const stream = fs.createReadStream(filePath, {
      highWaterMark: FINGERPRINT_CHUNK_SIZE,
    });

    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Resolves to `null` when the file cannot be read; `onError` receives the cause.
 */
export async function computeFingerprint(
  filePath: string,
  onError?: (error: unknown) => void,
): Promise<string | null> {
  try {
    return await calculateChecksum(filePath);
  } catch (error) {
    onError?.(error);
    return null;
  }
}
