import type { FileState } from './file-scanner';

export type SyncActionKind = 'upload' | 'overwrite' | 'delete';

export type SyncAction =
  | { kind: 'upload'; name: string; file: FileState }
  | { kind: 'overwrite'; name: string; file: FileState; previous: FileState }
  | { kind: 'delete'; name: string; previous: FileState };

export interface SyncActionFailure {
  kind: SyncActionKind;
  fileName: string;
  message: string;
  cause: unknown;
}

export type ActionOutcome =
  | { ok: true; action: SyncAction }
  | { ok: false; action: SyncAction; error: SyncActionFailure };

export type SyncMode = 'initial' | 'steady';

export interface SyncReport {
  mode: SyncMode;
  startedAt: Date;
  durationMs: number;
  scanned: number;
  unchanged: number;
  outcomes: ActionOutcome[];
  succeeded: number;
  failed: number;
  remoteFileCount: number | null;
}
