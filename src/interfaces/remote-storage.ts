/**
 * Remote storage related interfaces
 */

export interface RemoteFileInfo {
  name: string;
  size: number;
  modifiedTime: string;
}

/**
 * Capability the sync engine drives. Every operation rejects on failure.
 */
export interface RemoteStorageClient {
  /** Stores the file under its base name, replacing any existing copy. */
  upload(localPath: string): Promise<void>;
  overwrite(localPath: string): Promise<void>;
  /** Resolves when the object is gone, including when it never existed. */
  delete(name: string): Promise<void>;
  listRemote(): Promise<Map<string, RemoteFileInfo>>;
}

export interface YandexDiskServiceOptions {
  token: string;
  cloudFolder: string;
  verbosity?: number;
  baseUrl?: string;
  fetchFn?: (url: URL, init: RequestInit) => Promise<Response>;
  openFileFn?: (filePath: string) => Promise<Blob>;
}
