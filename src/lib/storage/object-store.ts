/**
 * オブジェクトストレージ（書き込み専用シンク）
 *
 * @description 本ジョブは Supabase Storage の1バケットに `extract/` と `data/` を書き込む。
 * 同じパスへの再アップロードは上書き（upsert）。
 */

import { StorageUploadError } from '../errors';
import { createLogger } from '../utils/logger';

export interface ObjectStore {
  /**
   * @throws {StorageUploadError}
   */
  upload(path: string, body: string, contentType: string): Promise<void>;
}

/** Supabase Storage のバケット API のうち本ジョブが使う部分 */
export interface StorageBucketApi {
  upload(
    path: string,
    body: Buffer,
    options?: { contentType?: string; upsert?: boolean }
  ): Promise<{ data: unknown; error: { message: string } | null }>;
}

export interface StorageApi {
  from(bucket: string): StorageBucketApi;
}

const logger = createLogger({ module: 'object-store' });

/**
 * Supabase Storage 実装
 *
 * @example
 * ```typescript
 * const store = new SupabaseObjectStore(createStorageClient(url, key).storage, 'ine-api');
 * await store.upload('data/data-20240101.csv', csv, 'text/csv');
 * ```
 */
export class SupabaseObjectStore implements ObjectStore {
  constructor(
    private readonly storage: StorageApi,
    private readonly bucket: string
  ) {}

  async upload(path: string, body: string, contentType: string): Promise<void> {
    const payload = Buffer.from(body, 'utf-8');

    let error: { message: string } | null;
    try {
      ({ error } = await this.storage
        .from(this.bucket)
        .upload(path, payload, { contentType, upsert: true }));
    } catch (cause) {
      throw new StorageUploadError(
        `Storage upload failed for ${this.bucket}/${path}`,
        path,
        { cause }
      );
    }

    if (error) {
      throw new StorageUploadError(
        `Storage upload failed for ${this.bucket}/${path}: ${error.message}`,
        path
      );
    }

    logger.debug('Object uploaded', { bucket: this.bucket, path, bytes: payload.length });
  }
}
