export interface ListObjectsOptions {
  prefix: string;
  /** Group keys by the next occurrence of this string into common prefixes. */
  delimiter?: string;
}

export interface ObjectListing {
  /** Object keys, in the order the store returned them. */
  keys: string[];
  /** Common prefixes (only populated when a delimiter was given). */
  prefixes: string[];
}

export interface PutObjectOptions {
  contentType?: string;
}

/**
 * Capabilities the album and site layers need from a key/object store.
 * An instance is bound to a single bucket.
 */
export interface ObjectStore {
  readonly bucket: string;
  listObjects(options: ListObjectsOptions): Promise<ObjectListing>;
  getObject(key: string): Promise<Uint8Array>;
  putObject(key: string, body: Uint8Array | string, options?: PutObjectOptions): Promise<void>;
  deleteObject(key: string): Promise<void>;
  ensureBucketExists(): Promise<void>;
  configureStaticWebsite(indexDocument: string): Promise<void>;
}
