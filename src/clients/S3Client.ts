import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  PutObjectCommand,
  ListObjectsV2Command,
  DeleteObjectCommand,
  HeadBucketCommand,
  PutObjectCommandInput,
  ListObjectsV2CommandInput,
  DeleteObjectCommandInput,
} from '@aws-sdk/client-s3';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { S3Client as IS3Client, S3Object } from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { DEFAULT_S3_ENDPOINT } from '../config/ConfigurationManager';
import { Result, ok, err } from '../types/Result';
import { formatError, toError } from '../utils/errors';

export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export interface RetryOptions {
  maxRetries: number;
  /** Delay before the second attempt; doubled for each further attempt */
  baseDelay: number;
}

const NON_RETRYABLE_CODES = [
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'AccessDenied',
  'NoSuchBucket',
  'InvalidBucketName',
];

/**
 * Build the AWS SDK client configuration.
 * The endpoint is only overridden when one other than the AWS default is configured.
 */
export function buildClientConfig(config: BackupConfig): S3ClientConfig {
  const clientConfig: S3ClientConfig = {
    region: config.s3Region,
  };

  if (config.s3AccessKey && config.s3SecretKey) {
    clientConfig.credentials = {
      accessKeyId: config.s3AccessKey,
      secretAccessKey: config.s3SecretKey,
    };
  }

  // Use custom endpoint if provided (for S3-compatible services)
  if (config.s3Endpoint && config.s3Endpoint.replace(/\/+$/, '') !== DEFAULT_S3_ENDPOINT) {
    clientConfig.endpoint = config.s3Endpoint;
    clientConfig.forcePathStyle = true; // Required for MinIO and other S3-compatible services
  }

  return clientConfig;
}

/**
 * S3Client implementation using AWS SDK v3
 * Provides file upload, listing, and deletion capabilities with retry logic
 */
export class S3Client implements IS3Client {
  private client: AWSS3Client;
  private bucket: string;
  private retry: RetryOptions;

  constructor(
    config: BackupConfig,
    private readonly logger: Logger,
    retry: RetryOptions = { maxRetries: 3, baseDelay: 1000 }
  ) {
    this.client = new AWSS3Client(buildClientConfig(config));
    this.bucket = config.s3Bucket;
    this.retry = retry;
  }

  /**
   * Upload a file to S3 with retry logic
   */
  async uploadFile(filePath: string, key: string): Promise<string> {
    return this.withRetry(async () => {
      // Each attempt streams the file from the start
      const fileStats = await stat(filePath);
      const fileStream = createReadStream(filePath);

      const uploadParams: PutObjectCommandInput = {
        Bucket: this.bucket,
        Key: key,
        Body: fileStream,
        ContentLength: fileStats.size,
        ContentType: 'application/gzip',
      };

      try {
        await this.client.send(new PutObjectCommand(uploadParams));
      } finally {
        fileStream.destroy();
      }

      return `s3://${this.bucket}/${key}`;
    }, `upload file ${filePath} to ${key}`);
  }

  /**
   * List objects under a prefix, one page per request
   */
  async *listObjects(prefix: string): AsyncGenerator<S3Object> {
    let continuationToken: string | undefined;

    do {
      const listParams: ListObjectsV2CommandInput = {
        Bucket: this.bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      };

      const response = await this.withRetry(
        () => this.client.send(new ListObjectsV2Command(listParams)),
        `list objects with prefix ${prefix}`
      );

      for (const obj of response.Contents ?? []) {
        if (obj.Key === undefined) {
          continue;
        }
        yield {
          key: obj.Key,
          lastModified: obj.LastModified,
          size: obj.Size ?? 0,
        };
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  /**
   * Delete an object from S3
   */
  async deleteObject(key: string): Promise<Result<void, Error>> {
    const deleteParams: DeleteObjectCommandInput = {
      Bucket: this.bucket,
      Key: key,
    };

    try {
      await this.withRetry(async () => {
        await this.client.send(new DeleteObjectCommand(deleteParams));
      }, `delete object ${key}`);
      return ok(undefined);
    } catch (error) {
      return err(toError(error));
    }
  }

  /**
   * Test S3 connectivity and permissions
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (error) {
      this.logger.error('S3 connection test failed', toError(error), { bucket: this.bucket });
      return false;
    }
  }

  /**
   * Execute an operation with exponential backoff retry logic
   */
  private async withRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const { maxRetries, baseDelay } = this.retry;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        // Don't retry on certain error types
        if (this.isNonRetryableError(error)) {
          throw new StorageError(
            `Failed to ${operationName}: ${formatError(error)}`,
            operationName,
            toError(error)
          );
        }

        if (attempt >= maxRetries) {
          throw new StorageError(
            `Failed to ${operationName} after ${maxRetries} attempts. Last error: ${formatError(error)}`,
            operationName,
            toError(error)
          );
        }

        const delay = baseDelay * Math.pow(2, attempt - 1);
        this.logger.warn(
          `Attempt ${attempt} failed for ${operationName}: ${formatError(error)}. Retrying in ${delay}ms...`
        );

        await this.sleep(delay);
      }
    }
  }

  /**
   * Check if an error should not be retried
   */
  private isNonRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }

    // Don't retry on authentication errors, permission errors, or invalid bucket names
    if (NON_RETRYABLE_CODES.includes(error.name)) {
      return true;
    }

    const status = '$metadata' in error ? httpStatusOf(error.$metadata) : undefined;
    return status !== undefined && status >= 400 && status < 500;
  }

  /**
   * Sleep for specified milliseconds
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

function httpStatusOf(metadata: unknown): number | undefined {
  if (typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata) {
    const { httpStatusCode } = metadata;
    return typeof httpStatusCode === 'number' ? httpStatusCode : undefined;
  }
  return undefined;
}
