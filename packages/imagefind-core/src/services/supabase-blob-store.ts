import type { SupabaseClient } from '@supabase/supabase-js';
import { CollaboratorError } from '../errors';
import { createLogger } from '../logger';
import type { BlobStore } from '../types/collaborator.types';

const logger = createLogger('supabase-blob-store');

const LIST_PAGE_SIZE = 1000;

/**
 * Blob store backed by a Supabase Storage bucket.
 * Keys are flat object names at the bucket root.
 */
export class SupabaseBlobStore implements BlobStore {
  constructor(
    private readonly db: SupabaseClient,
    private readonly bucketName: string
  ) {
    logger.info({ bucket: bucketName }, 'Blob store initialized');
  }

  private get bucket() {
    return this.db.storage.from(this.bucketName);
  }

  async exists(key: string): Promise<boolean> {
    const { data, error } = await this.bucket.list('', { search: key, limit: 100 });

    if (error) {
      throw new CollaboratorError('blob-store', 'Existence check failed', { key }, error);
    }

    return data.some(object => object.name === key);
  }

  async put(key: string, bytes: Buffer, contentType?: string): Promise<void> {
    const { error } = await this.bucket.upload(key, bytes, {
      contentType,
      upsert: true
    });

    if (error) {
      throw new CollaboratorError('blob-store', 'Upload failed', { key, sizeKB: Math.round(bytes.length / 1024) }, error);
    }

    logger.debug({ key, sizeKB: Math.round(bytes.length / 1024) }, 'Object stored');
  }

  async get(key: string): Promise<Buffer> {
    const { data, error } = await this.bucket.download(key);

    if (error || !data) {
      throw new CollaboratorError('blob-store', 'Download failed', { key }, error);
    }

    return Buffer.from(await data.arrayBuffer());
  }

  /**
   * List keys starting with `prefix`, following pagination to the end
   */
  async list(prefix: string = ''): Promise<string[]> {
    const keys: string[] = [];

    for (let offset = 0; ; offset += LIST_PAGE_SIZE) {
      const { data, error } = await this.bucket.list('', {
        limit: LIST_PAGE_SIZE,
        offset,
        search: prefix,
        sortBy: { column: 'name', order: 'asc' }
      });

      if (error) {
        throw new CollaboratorError('blob-store', 'Listing failed', { prefix, offset }, error);
      }

      keys.push(...data.map(object => object.name).filter(name => name.startsWith(prefix)));

      if (data.length < LIST_PAGE_SIZE) {
        return keys;
      }
    }
  }

  publicUrl(key: string): string {
    return this.bucket.getPublicUrl(key).data.publicUrl;
  }
}
