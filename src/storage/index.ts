/**
 * Storage Module
 *
 * Artifact persistence for research runs:
 * - S3StorageAdapter using AWS SDK v3
 * - MemoryStorageAdapter for tests and local runs
 *
 * Object layout:
 * - {prefix}/{run_id}/target.json
 * - {prefix}/{run_id}/record.json
 * - {prefix}/{run_id}/run_artifact.json
 * - {prefix}/{run_id}/outreach.json
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { ResearchError } from '../errors/index.js';
import type { PipelineConfig } from '../config/index.js';
import type { ArtifactMetadata, ArtifactType, RunId, StorageAdapter } from '../types/index.js';

export type { StorageAdapter };

const ARTIFACT_FILE_NAMES: Record<ArtifactType, string> = {
  target: 'target.json',
  record: 'record.json',
  run_artifact: 'run_artifact.json',
  outreach: 'outreach.json',
};

function isArtifactType(value: string): value is ArtifactType {
  return value in ARTIFACT_FILE_NAMES;
}

function fileNameFor(artifactType: string): string {
  return isArtifactType(artifactType) ? ARTIFACT_FILE_NAMES[artifactType] : `${artifactType}.json`;
}

function artifactTypeFor(fileName: string): string {
  for (const [type, name] of Object.entries(ARTIFACT_FILE_NAMES)) {
    if (name === fileName) {
      return type;
    }
  }
  return fileName.replace(/\.json$/, '');
}

function contentTypeFrom(metadata?: Record<string, unknown>): string {
  const value = metadata?.contentType;
  return typeof value === 'string' ? value : 'application/json';
}

export interface S3Config {
  bucket: string;
  region?: string;
  /** Key prefix for all objects (defaults to 'runs') */
  prefix?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  forcePathStyle?: boolean;
}

function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.message.includes('404') ||
      error.message.includes('Not Found'))
  );
}

// ============================================================================
// S3
// ============================================================================

/**
 * S3 implementation of StorageAdapter
 */
export class S3StorageAdapter implements StorageAdapter {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;

  constructor(config: S3Config) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'runs';

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

  private getKey(runId: RunId, artifactType: string): string {
    return `${this.prefix}/${runId}/${fileNameFor(artifactType)}`;
  }

  async save(
    runId: RunId,
    artifactType: string,
    content: string | Buffer,
    metadata?: Record<string, unknown>
  ): Promise<ArtifactMetadata> {
    const now = new Date().toISOString();
    const checksum = calculateChecksum(content);
    const contentType = contentTypeFrom(metadata);

    const s3Metadata: Record<string, string> = {
      'run-id': runId,
      'artifact-type': artifactType,
      'created-at': now,
      checksum,
    };
    for (const [key, value] of Object.entries(metadata ?? {})) {
      if (key !== 'contentType' && typeof value === 'string') {
        s3Metadata[key] = value;
      }
    }

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(runId, artifactType),
        Body: content,
        ContentType: contentType,
        Metadata: s3Metadata,
      })
    );

    return {
      runId,
      artifactType,
      fileName: fileNameFor(artifactType),
      createdAt: now,
      contentType,
      size: getContentSize(content),
      checksum,
    };
  }

  async load(runId: RunId, artifactType: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const response = await this.client
      .send(new GetObjectCommand({ Bucket: this.bucket, Key: this.getKey(runId, artifactType) }))
      .catch((error: unknown) => {
        if (isNotFound(error)) {
          throw new ResearchError('ARTIFACT_NOT_FOUND', `Artifact not found: ${runId}/${artifactType}`, { cause: error });
        }
        throw error;
      });

    if (!response.Body) {
      throw new ResearchError('ARTIFACT_NOT_FOUND', `Artifact not found: ${runId}/${artifactType}`);
    }

    const content = await response.Body.transformToString();
    const metadata: ArtifactMetadata = {
      runId,
      artifactType,
      fileName: fileNameFor(artifactType),
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? 'application/json',
    };
    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }
    if (response.Metadata?.checksum) {
      metadata.checksum = response.Metadata.checksum;
    }

    return { content, metadata };
  }

  async exists(runId: RunId, artifactType: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: this.getKey(runId, artifactType) })
      );
      return true;
    } catch (error: unknown) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({ Bucket: this.bucket, Prefix: `${this.prefix}/${runId}/` })
    );

    return (response.Contents ?? []).map((object) => {
      const fileName = object.Key?.split('/').pop() ?? '';
      const metadata: ArtifactMetadata = {
        runId,
        artifactType: artifactTypeFor(fileName),
        fileName,
        createdAt: object.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: 'application/json',
      };
      if (object.Size !== undefined) {
        metadata.size = object.Size;
      }
      return metadata;
    });
  }

  /**
   * Delete one artifact, or every artifact of the run when no type is given
   */
  async delete(runId: RunId, artifactType?: string): Promise<void> {
    const types = artifactType ? [artifactType] : (await this.list(runId)).map((artifact) => artifact.artifactType);
    for (const type of types) {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: this.getKey(runId, type) }));
    }
  }
}

// ============================================================================
// Memory
// ============================================================================

/**
 * In-memory storage adapter with the same contract as S3StorageAdapter
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store = new Map<string, { content: string | Buffer; metadata: ArtifactMetadata }>();

  private getKey(runId: RunId, artifactType: string): string {
    return `${runId}/${artifactType}`;
  }

  async save(
    runId: RunId,
    artifactType: string,
    content: string | Buffer,
    metadata?: Record<string, unknown>
  ): Promise<ArtifactMetadata> {
    const artifactMetadata: ArtifactMetadata = {
      runId,
      artifactType,
      fileName: fileNameFor(artifactType),
      createdAt: new Date().toISOString(),
      contentType: contentTypeFrom(metadata),
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };
    this.store.set(this.getKey(runId, artifactType), { content, metadata: artifactMetadata });
    return artifactMetadata;
  }

  async load(runId: RunId, artifactType: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(this.getKey(runId, artifactType));
    if (!item) {
      throw new ResearchError('ARTIFACT_NOT_FOUND', `Artifact not found: ${runId}/${artifactType}`);
    }
    return item;
  }

  async exists(runId: RunId, artifactType: string): Promise<boolean> {
    return this.store.has(this.getKey(runId, artifactType));
  }

  async list(runId: RunId): Promise<ArtifactMetadata[]> {
    const prefix = `${runId}/`;
    return [...this.store.entries()].filter(([key]) => key.startsWith(prefix)).map(([, value]) => value.metadata);
  }

  async delete(runId: RunId, artifactType?: string): Promise<void> {
    if (artifactType) {
      this.store.delete(this.getKey(runId, artifactType));
      return;
    }
    const prefix = `${runId}/`;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  /** Clear all stored artifacts */
  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }
}

/**
 * S3 when a bucket is configured, memory otherwise
 */
export function createStorageAdapter(config: Pick<PipelineConfig, 'storage'>): StorageAdapter {
  if (!config.storage.bucket) {
    return new MemoryStorageAdapter();
  }
  return new S3StorageAdapter({
    bucket: config.storage.bucket,
    region: config.storage.region,
    prefix: config.storage.prefix,
  });
}

export default {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
};
