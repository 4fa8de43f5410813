export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}

export type LogLevel =
  | 'DEBUG'
  | 'INFO'
  | 'SUCCESS'
  | 'WARNING'
  | 'ERROR'
  | 'CRITICAL';

export interface LogFileOptions {
  maxBytes?: number;
  retentionMs?: number;
}
