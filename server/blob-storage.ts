import { Storage } from "@google-cloud/storage";
import crypto from "crypto";
import { StorageError } from "./error-handling";
import { trackApiCall } from "./monitoring";
import { callStorageWithRetry } from "./retry-strategy";

/**
 * Object storage keyed by path. Scans and simulation variants live here;
 * records only ever hold the path.
 */
export interface BlobStore {
  put(path: string, data: Buffer, contentType: string): Promise<void>;
  get(path: string): Promise<Buffer>;
  // Deleting a missing path is not an error
  delete(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
  publicUrl(path: string): string;
}

export const EXTENSION_BY_CONTENT_TYPE: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'image/avif': 'avif',
  'image/bmp': 'bmp',
};

// Same bytes always land on the same path
export function scanImagePath(imageHash: string, contentType: string): string {
  const ext = EXTENSION_BY_CONTENT_TYPE[contentType] ?? 'bin';
  return `scans/${imageHash}.${ext}`;
}

export function simulationImagePath(target: string): string {
  const suffix = crypto.randomBytes(4).toString('hex');
  return `simulations/simulation_${target}_${Date.now()}_${suffix}.png`;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class GcsBlobStore implements BlobStore {
  private readonly storageClient = new Storage();

  constructor(
    private readonly bucketName: string,
    private readonly publicBaseUrl = `https://storage.googleapis.com/${bucketName}`,
  ) {}

  private file(path: string) {
    return this.storageClient.bucket(this.bucketName).file(path);
  }

  async put(path: string, data: Buffer, contentType: string): Promise<void> {
    try {
      await trackApiCall('object_storage', () => callStorageWithRetry(() =>
        this.file(path).save(data, {
          contentType,
          metadata: {
            cacheControl: 'public, max-age=31536000',
          },
        })
      ));
    } catch (error) {
      throw new StorageError('put', toError(error));
    }
  }

  async get(path: string): Promise<Buffer> {
    try {
      const [contents] = await trackApiCall('object_storage', () => callStorageWithRetry(() => this.file(path).download()));
      return contents;
    } catch (error) {
      throw new StorageError('get', toError(error));
    }
  }

  async delete(path: string): Promise<void> {
    try {
      await trackApiCall('object_storage', () => this.file(path).delete({ ignoreNotFound: true }));
    } catch (error) {
      throw new StorageError('delete', toError(error));
    }
  }

  async exists(path: string): Promise<boolean> {
    const [found] = await this.file(path).exists();
    return found;
  }

  publicUrl(path: string): string {
    return `${this.publicBaseUrl.replace(/\/+$/, '')}/${path}`;
  }
}

/**
 * In-process blob store for development and tests, served through /api/files
 */
export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, { data: Buffer; contentType: string }>();

  async put(path: string, data: Buffer, contentType: string): Promise<void> {
    this.blobs.set(path, { data: Buffer.from(data), contentType });
  }

  async get(path: string): Promise<Buffer> {
    const blob = this.blobs.get(path);
    if (!blob) {
      throw new StorageError('get', new Error(`No object at ${path}`));
    }
    return Buffer.from(blob.data);
  }

  async delete(path: string): Promise<void> {
    this.blobs.delete(path);
  }

  async exists(path: string): Promise<boolean> {
    return this.blobs.has(path);
  }

  paths(): string[] {
    return Array.from(this.blobs.keys()).sort();
  }

  publicUrl(path: string): string {
    return `/api/files/${path}`;
  }
}
