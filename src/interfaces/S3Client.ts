import { Result } from '../types/Result';

/**
 * Represents an S3 object with metadata
 */
export interface S3Object {
  /** S3 object key */
  key: string;

  /** Last modified timestamp */
  lastModified?: Date;

  /** Size of the object in bytes */
  size: number;
}

/**
 * Gateway over an S3-compatible object store
 */
export interface S3Client {
  /** Upload a local file under the given key, returning its s3:// location */
  uploadFile(filePath: string, key: string): Promise<string>;

  /**
   * List objects under a prefix in lexicographic key order.
   * Pages are fetched lazily; each call starts a fresh listing.
   */
  listObjects(prefix: string): AsyncIterable<S3Object>;

  /** Delete an object; failures are returned rather than thrown */
  deleteObject(key: string): Promise<Result<void, Error>>;

  /** Test S3 connectivity and permissions */
  testConnection(): Promise<boolean>;
}
