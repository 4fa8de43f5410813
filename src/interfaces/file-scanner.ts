/**
 * Local scanning related interfaces and types
 */

/**
 * One regular file observed in the watched directory during a scan
 */
export interface FileState {
  name: string;
  path: string;
  fingerprint: string;
  size: number;
  modifiedTime: Date;
}

/**
 * Every successfully read file of one scan, keyed by base name
 */
export type Snapshot = ReadonlyMap<string, FileState>;

/**
 * Anything able to produce a fresh snapshot of the watched directory
 */
export interface SnapshotSource {
  scan(): Promise<Snapshot>;
}
