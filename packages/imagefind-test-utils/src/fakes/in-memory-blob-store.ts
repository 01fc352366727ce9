import type { BlobStore } from '@imagefind/core';

/**
 * Map-backed blob store recording every call
 */
export class InMemoryBlobStore implements BlobStore {
  readonly objects = new Map<string, Buffer>();
  readonly puts: string[] = [];
  readonly gets: string[] = [];
  readonly existsChecks: string[] = [];
  readonly failingKeys = new Set<string>();

  constructor(private readonly bucket = 'test-bucket') {}

  async exists(key: string): Promise<boolean> {
    this.existsChecks.push(key);
    return this.objects.has(key);
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    this.puts.push(key);
    if (this.failingKeys.has(key)) {
      throw new Error(`upload of ${key} refused`);
    }
    this.objects.set(key, Buffer.from(bytes));
  }

  async get(key: string): Promise<Buffer> {
    this.gets.push(key);
    const bytes = this.objects.get(key);
    if (!bytes) {
      throw new Error(`object ${key} not found`);
    }
    return Buffer.from(bytes);
  }

  async list(prefix = ''): Promise<string[]> {
    return Array.from(this.objects.keys())
      .filter(key => key.startsWith(prefix))
      .sort();
  }

  publicUrl(key: string): string {
    return `memory://${this.bucket}/${key}`;
  }
}
