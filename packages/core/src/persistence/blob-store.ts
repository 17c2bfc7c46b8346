/**
 * Key-value storage of opaque byte blobs
 */
export interface BlobStore {
  get(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer): Promise<void>;
}

export class MemoryBlobStore implements BlobStore {
  private readonly blobs = new Map<string, Buffer>();

  async get(key: string): Promise<Buffer | null> {
    const value = this.blobs.get(key);
    return value ? Buffer.from(value) : null;
  }

  async set(key: string, value: Buffer): Promise<void> {
    this.blobs.set(key, Buffer.from(value));
  }

  has(key: string): boolean {
    return this.blobs.has(key);
  }
}
