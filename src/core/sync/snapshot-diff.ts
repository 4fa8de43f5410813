import type { Snapshot } from '../../interfaces/file-scanner';
import type { SyncAction } from '../../interfaces/sync';

export interface SnapshotDiff {
  actions: SyncAction[];
  unchanged: string[];
}

/**
 * Classifies every name of `current` against `cache`.
 *
 * Uploads and overwrites come first, in scan order, followed by deletes in
 * cache order. Only the fingerprint decides whether a file changed.
 */
export function diffSnapshots(cache: Snapshot, current: Snapshot): SnapshotDiff {
  const actions: SyncAction[] = [];
  const unchanged: string[] = [];

  for (const [name, file] of current) {
    const previous = cache.get(name);

    if (!previous) {
      actions.push({ kind: 'upload', name, file });
    } else if (previous.fingerprint !== file.fingerprint) {
      actions.push({ kind: 'overwrite', name, file, previous });
    } else {
      unchanged.push(name);
    }
  }

  for (const [name, previous] of cache) {
    if (!current.has(name)) {
      actions.push({ kind: 'delete', name, previous });
    }
  }

  return { actions, unchanged };
}
