/**
 * Yandex Disk REST client
 * Implements the remote storage capability against a single cloud folder
 */

import path from 'node:path';
import { openAsBlob } from 'node:fs';
import { z } from 'zod';
import * as logger from '../../utils/logger';
import { formatError } from '../../utils/error-handler';
import {
  RemoteAuthError,
  RemoteHttpError,
  RemoteNetworkError,
  RemoteNotFoundError,
  RemoteStorageError,
} from '../remote/errors';
import type {
  RemoteFileInfo,
  RemoteStorageClient,
  YandexDiskServiceOptions,
} from '../../interfaces/remote-storage';

export const YANDEX_DISK_API_URL = 'https://cloud-api.yandex.net/v1/disk';
const LIST_LIMIT = 1000;

const UploadLinkSchema = z.object({
  href: z.string().url(),
});

const ResourceListSchema = z.object({
  _embedded: z
    .object({
      items: z.array(
        z.object({
          name: z.string(),
          type: z.string(),
          size: z.number().optional(),
          modified: z.string().optional(),
        }),
      ),
    })
    .optional(),
});

type QueryParams = Record<string, string | number | boolean>;

export function createYandexDiskService(options: YandexDiskServiceOptions) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const baseUrl = options.baseUrl ?? YANDEX_DISK_API_URL;
  const cloudFolder = options.cloudFolder.replace(/\/+$/, '');
  const fetchFn = options.fetchFn ?? ((url: URL, init: RequestInit) => fetch(url, init));
  const openFile = options.openFileFn ?? ((filePath: string) => openAsBlob(filePath));
  const headers = {
    Authorization: `OAuth ${options.token}`,
    Accept: 'application/json',
  };

  const remotePathFor = (name: string): string => `${cloudFolder}/${name}`;

  const send = async (url: URL, init: RequestInit): Promise<Response> => {
    try {
      return await fetchFn(url, init);
    } catch (error) {
      throw new RemoteNetworkError(
        `No connection to Yandex Disk: ${formatError(error)}`,
        { cause: error },
      );
    }
  };

  const ensureOk = async (response: Response, target: string): Promise<Response> => {
    if (response.ok) {
      return response;
    }

    const body = await response.text();
    if (response.status === 401) {
      throw new RemoteAuthError('Invalid Yandex Disk access token');
    }
    if (response.status === 404) {
      throw new RemoteNotFoundError(`Resource not found on Yandex Disk: ${target}`);
    }
    throw new RemoteHttpError(response.status, body);
  };

  const request = async (
    method: string,
    endpoint: string,
    params: QueryParams = {},
  ): Promise<Response> => {
    const url = new URL(`${baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    const response = await send(url, { method, headers });
    return ensureOk(response, String(params.path ?? endpoint));
  };

  /**
   * Validates the token and creates the cloud folder when missing.
   * Failures here are configuration problems and must stop startup.
   */
  const connect = async (): Promise<void> => {
    try {
      await request('GET', '');
    } catch (error) {
      throw new RemoteStorageError(
        `Cannot connect to Yandex Disk: ${formatError(error)}`,
        { cause: error },
      );
    }

    try {
      await request('PUT', '/resources', { path: cloudFolder });
      logger.info(`Created cloud folder ${cloudFolder}`, verbosity);
    } catch (error) {
      if (error instanceof RemoteHttpError && error.status === 409) {
        logger.verbose(`Cloud folder ${cloudFolder} already exists`, verbosity);
        return;
      }
      throw error;
    }
  };

  const upload = async (localPath: string): Promise<void> => {
    const remotePath = remotePathFor(path.basename(localPath));
    logger.verbose(`Uploading ${localPath} to ${remotePath}`, verbosity);

    const linkResponse = await request('GET', '/resources/upload', {
      path: remotePath,
      overwrite: true,
    });
    const link = UploadLinkSchema.safeParse(await linkResponse.json());
    if (!link.success) {
      throw new RemoteStorageError(
        `Yandex Disk returned no upload URL for ${remotePath}`,
      );
    }

    let body: Blob;
    try {
      body = await openFile(localPath);
    } catch (error) {
      throw new RemoteStorageError(
        `Error reading file ${localPath}: ${formatError(error)}`,
        { cause: error },
      );
    }

    const uploadResponse = await send(new URL(link.data.href), {
      method: 'PUT',
      body,
    });
    await ensureOk(uploadResponse, remotePath);
  };

  const overwrite = async (localPath: string): Promise<void> => {
    await upload(localPath);
  };

  const remove = async (name: string): Promise<void> => {
    const remotePath = remotePathFor(name);
    logger.verbose(`Deleting ${remotePath}`, verbosity);

    try {
      await request('DELETE', '/resources', {
        path: remotePath,
        permanently: true,
      });
    } catch (error) {
      if (error instanceof RemoteNotFoundError) {
        logger.verbose(`${remotePath} already absent`, verbosity);
        return;
      }
      throw error;
    }
  };

  const listRemote = async (): Promise<Map<string, RemoteFileInfo>> => {
    const response = await request('GET', '/resources', {
      path: cloudFolder,
      limit: LIST_LIMIT,
    });
    const parsed = ResourceListSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RemoteStorageError(
        `Unexpected listing format for ${cloudFolder}: ${parsed.error.message}`,
      );
    }

    const files = new Map<string, RemoteFileInfo>();
    for (const item of parsed.data._embedded?.items ?? []) {
      if (item.type !== 'file') {
        continue;
      }
      files.set(item.name, {
        name: item.name,
        size: item.size ?? 0,
        modifiedTime: item.modified ?? '',
      });
    }
    return files;
  };

  const service: RemoteStorageClient & { connect: () => Promise<void> } = {
    connect,
    upload,
    overwrite,
    delete: remove,
    listRemote,
  };
  return service;
}

export type YandexDiskService = ReturnType<typeof createYandexDiskService>;
