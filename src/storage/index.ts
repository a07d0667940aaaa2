/**
 * Storage Module
 *
 * Responsibilities:
 * - Define the StorageAdapter substrate (collection + key → JSON document)
 * - Implement S3StorageAdapter using AWS SDK v3
 * - Implement FileStorageAdapter for a local data directory
 * - Implement MemoryStorageAdapter for testing
 * - Provide create-if-absent writes for unique inserts
 *
 * Storage layout:
 * - qualifications/{lead_id}.json
 * - events/{lead_id}/{sequence}.json
 *
 * Usage:
 * const storage = createStorageAdapter({ type: 'file', directory: './data' });
 * await storage.save('qualifications', leadId, JSON.stringify(record));
 */

import {
  S3Client,
  S3ServiceException,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash, randomBytes } from 'crypto';
import { mkdir, readFile, readdir, rename, stat, writeFile, link, unlink } from 'fs/promises';
import { dirname, join, relative, sep } from 'path';
import type { StorageAdapter, StoredObject, StoredObjectMetadata } from '../types/index.js';

export type { StorageAdapter };

const CONTENT_TYPE = 'application/json';
const FILE_EXTENSION = '.json';
const KEY_SEGMENT_PATTERN = /^[A-Za-z0-9._@+-]+$/;

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'qualification') */
  prefix?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

/**
 * Local filesystem configuration for storage adapter
 */
export interface FileConfig {
  /** Root data directory */
  directory: string;
}

export type StorageConfig =
  | ({ type: 's3' } & S3Config)
  | ({ type: 'file' } & FileConfig)
  | { type: 'memory' };

/**
 * Calculate MD5 checksum for content
 *
 * @param content - String content
 * @returns MD5 hash as hex string
 */
function calculateChecksum(content: string): string {
  return createHash('md5').update(Buffer.from(content, 'utf-8')).digest('hex');
}

/**
 * Get content size in bytes
 */
function getContentSize(content: string): number {
  return Buffer.byteLength(content, 'utf-8');
}

/**
 * Reject keys that could escape their collection or break object naming
 */
export function assertValidKey(collection: string, key: string): void {
  const segments = [collection, ...key.split('/')];
  for (const segment of segments) {
    if (!KEY_SEGMENT_PATTERN.test(segment) || segment === '.' || segment === '..') {
      throw new Error(`Invalid storage key: ${collection}/${key}`);
    }
  }
}

function buildMetadata(collection: string, key: string, content: string, createdAt: string): StoredObjectMetadata {
  return {
    collection,
    key,
    createdAt,
    contentType: CONTENT_TYPE,
    size: getContentSize(content),
    checksum: calculateChecksum(content),
  };
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

// ============================================================================
// S3
// ============================================================================

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 *
 * Create-if-absent writes use conditional puts (If-None-Match: *), so two
 * processes racing on the same key cannot both succeed.
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  /**
   * Create a new S3StorageAdapter
   *
   * @param config - S3 configuration options
   * @param client - Preconfigured client (takes precedence over connection options)
   */
  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'qualification';

    if (client) {
      this.client = client;
      return;
    }

    // Build S3 client configuration
    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  /**
   * Generate S3 key for an object
   */
  private getKey(collection: string, key: string): string {
    assertValidKey(collection, key);
    return `${this.prefix}/${collection}/${key}${FILE_EXTENSION}`;
  }

  private putCommand(collection: string, key: string, content: string, ifAbsent: boolean): PutObjectCommand {
    const now = new Date().toISOString();
    return new PutObjectCommand({
      Bucket: this.bucket,
      Key: this.getKey(collection, key),
      Body: content,
      ContentType: CONTENT_TYPE,
      Metadata: {
        'created-at': now,
        checksum: calculateChecksum(content),
      },
      ...(ifAbsent ? { IfNoneMatch: '*' } : {}),
    });
  }

  async save(collection: string, key: string, content: string): Promise<StoredObjectMetadata> {
    await this.client.send(this.putCommand(collection, key, content, false));
    return buildMetadata(collection, key, content, new Date().toISOString());
  }

  async saveIfAbsent(collection: string, key: string, content: string): Promise<StoredObjectMetadata | null> {
    try {
      await this.client.send(this.putCommand(collection, key, content, true));
    } catch (error: unknown) {
      // 412: the key exists; 409: a concurrent conditional write on the key won
      if (
        error instanceof S3ServiceException &&
        (error.name === 'PreconditionFailed' ||
          error.$metadata.httpStatusCode === 412 ||
          error.$metadata.httpStatusCode === 409)
      ) {
        return null;
      }
      throw error;
    }
    return buildMetadata(collection, key, content, new Date().toISOString());
  }

  async load(collection: string, key: string): Promise<StoredObject | null> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: this.getKey(collection, key),
    });

    try {
      const response = await this.client.send(command);
      if (!response.Body) {
        return null;
      }

      // Convert stream to string
      const content = await response.Body.transformToString();
      const metadata = buildMetadata(
        collection,
        key,
        content,
        response.Metadata?.['created-at'] ?? response.LastModified?.toISOString() ?? new Date().toISOString()
      );
      return { content, metadata };
    } catch (error: unknown) {
      if (error instanceof S3ServiceException && (error.name === 'NoSuchKey' || error.$metadata.httpStatusCode === 404)) {
        return null;
      }
      throw error;
    }
  }

  async exists(collection: string, key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(collection, key),
        })
      );
      return true;
    } catch (error: unknown) {
      // Check for "not found" errors
      if (
        error instanceof Error &&
        (error.name === 'NotFound' ||
          error.name === 'NoSuchKey' ||
          error.message.includes('404') ||
          error.message.includes('Not Found'))
      ) {
        return false;
      }
      // Re-throw unexpected errors
      throw error;
    }
  }

  async list(collection: string, prefix = ''): Promise<string[]> {
    const collectionPrefix = `${this.prefix}/${collection}/`;
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: `${collectionPrefix}${prefix}`,
          ContinuationToken: continuationToken,
        })
      );

      for (const obj of response.Contents ?? []) {
        if (obj.Key && obj.Key.endsWith(FILE_EXTENSION)) {
          keys.push(obj.Key.slice(collectionPrefix.length, -FILE_EXTENSION.length));
        }
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    return keys.sort();
  }
}

// ============================================================================
// Local Filesystem
// ============================================================================

/**
 * Filesystem implementation of StorageAdapter
 *
 * Writes land in a temporary file first and are moved into place, so readers
 * never see a half-written document. Create-if-absent uses a hard link, which
 * fails atomically when the target exists.
 */
export class FileStorageAdapter implements StorageAdapter {
  private directory: string;

  constructor(config: FileConfig) {
    this.directory = config.directory;
  }

  private getPath(collection: string, key: string): string {
    assertValidKey(collection, key);
    return join(this.directory, collection, ...key.split('/')) + FILE_EXTENSION;
  }

  private async writeTemp(path: string, content: string): Promise<string> {
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    await writeFile(tempPath, content, 'utf-8');
    return tempPath;
  }

  async save(collection: string, key: string, content: string): Promise<StoredObjectMetadata> {
    const path = this.getPath(collection, key);
    const tempPath = await this.writeTemp(path, content);
    await rename(tempPath, path);
    return buildMetadata(collection, key, content, new Date().toISOString());
  }

  async saveIfAbsent(collection: string, key: string, content: string): Promise<StoredObjectMetadata | null> {
    const path = this.getPath(collection, key);
    const tempPath = await this.writeTemp(path, content);

    try {
      await link(tempPath, path);
    } catch (error: unknown) {
      if (hasErrorCode(error, 'EEXIST')) {
        return null;
      }
      throw error;
    } finally {
      await unlink(tempPath);
    }

    return buildMetadata(collection, key, content, new Date().toISOString());
  }

  async load(collection: string, key: string): Promise<StoredObject | null> {
    const path = this.getPath(collection, key);

    try {
      const [content, info] = await Promise.all([readFile(path, 'utf-8'), stat(path)]);
      return { content, metadata: buildMetadata(collection, key, content, info.mtime.toISOString()) };
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  async exists(collection: string, key: string): Promise<boolean> {
    try {
      await stat(this.getPath(collection, key));
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  async list(collection: string, prefix = ''): Promise<string[]> {
    const collectionRoot = join(this.directory, collection);
    const prefixDir = prefix.includes('/') ? prefix.slice(0, prefix.lastIndexOf('/')) : '';
    const keys: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries;
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (error: unknown) {
        if (hasErrorCode(error, 'ENOENT')) {
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile() && entry.name.endsWith(FILE_EXTENSION)) {
          const key = relative(collectionRoot, fullPath).split(sep).join('/').slice(0, -FILE_EXTENSION.length);
          if (key.startsWith(prefix)) {
            keys.push(key);
          }
        }
      }
    };

    await walk(prefixDir ? join(collectionRoot, ...prefixDir.split('/')) : collectionRoot);
    return keys.sort();
  }
}

// ============================================================================
// Memory
// ============================================================================

/**
 * In-memory storage adapter for testing and development
 *
 * Provides the same interface as the durable adapters but keeps documents in
 * a Map. Check-and-set happens without an intervening await, so
 * saveIfAbsent is atomic within the process.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, StoredObject> = new Map();

  /**
   * Generate storage key
   */
  private getKey(collection: string, key: string): string {
    assertValidKey(collection, key);
    return `${collection}/${key}`;
  }

  async save(collection: string, key: string, content: string): Promise<StoredObjectMetadata> {
    const metadata = buildMetadata(collection, key, content, new Date().toISOString());
    this.store.set(this.getKey(collection, key), { content, metadata });
    return metadata;
  }

  async saveIfAbsent(collection: string, key: string, content: string): Promise<StoredObjectMetadata | null> {
    const storeKey = this.getKey(collection, key);
    if (this.store.has(storeKey)) {
      return null;
    }
    const metadata = buildMetadata(collection, key, content, new Date().toISOString());
    this.store.set(storeKey, { content, metadata });
    return metadata;
  }

  async load(collection: string, key: string): Promise<StoredObject | null> {
    return this.store.get(this.getKey(collection, key)) ?? null;
  }

  async exists(collection: string, key: string): Promise<boolean> {
    return this.store.has(this.getKey(collection, key));
  }

  async list(collection: string, prefix = ''): Promise<string[]> {
    const collectionPrefix = `${collection}/`;
    const keys: string[] = [];

    for (const storeKey of this.store.keys()) {
      if (storeKey.startsWith(collectionPrefix)) {
        const key = storeKey.slice(collectionPrefix.length);
        if (key.startsWith(prefix)) {
          keys.push(key);
        }
      }
    }

    return keys.sort();
  }

  /**
   * Overwrite a raw document, bypassing validation (test fixtures for
   * records written by older builds)
   */
  seed(collection: string, key: string, document: unknown): void {
    const content = JSON.stringify(document);
    this.store.set(this.getKey(collection, key), {
      content,
      metadata: buildMetadata(collection, key, content, new Date().toISOString()),
    });
  }

  /**
   * Clear all stored documents (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Get the number of stored documents (useful for testing)
   */
  size(): number {
    return this.store.size;
  }

  /**
   * Get all stored keys (useful for debugging)
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * Factory function to create the storage adapter a configuration names
 *
 * @param config - Configuration options
 * @returns Storage adapter instance
 */
export function createStorageAdapter(config: StorageConfig): StorageAdapter {
  switch (config.type) {
    case 'memory':
      return new MemoryStorageAdapter();
    case 'file':
      return new FileStorageAdapter({ directory: config.directory });
    case 's3':
      return new S3StorageAdapter(config);
  }
}
