/**
 * S3 object store. The sha256 of each object travels in its user metadata,
 * since S3 ETags are not content hashes for multipart or KMS-encrypted objects.
 */

import {
  HeadObjectCommand,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';

import type { ObjectStoreClient, StoredObject } from './object-store.js';

/** User metadata key carrying the content hash (`x-amz-meta-sha256`). */
export const SHA256_METADATA_KEY = 'sha256';

/** Options for the S3 store. */
export interface S3ObjectStoreOptions {
  bucket: string;
  /** Preconfigured client; one is built from `region` when omitted. */
  client?: S3Client;
  region?: string;
}

function isNotFound(err: unknown): boolean {
  if (err instanceof NotFound) return true;
  return (
    err instanceof S3ServiceException && err.$metadata.httpStatusCode === 404
  );
}

/** Create an S3-backed store for one bucket. */
export function createS3ObjectStore(
  options: S3ObjectStoreOptions,
): ObjectStoreClient {
  const { bucket } = options;
  const client = options.client ?? new S3Client({ region: options.region });

  return {
    description: `s3://${bucket}`,

    async headObject(key, callOptions): Promise<StoredObject | null> {
      try {
        const head = await client.send(
          new HeadObjectCommand({ Bucket: bucket, Key: key }),
          { abortSignal: callOptions?.signal },
        );
        return {
          // Objects written without the metadata key never match a plan hash.
          contentHash: head.Metadata?.[SHA256_METADATA_KEY] ?? '',
          sizeBytes: head.ContentLength ?? 0,
        };
      } catch (err: unknown) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async putObject(key, body, meta, callOptions): Promise<void> {
      await client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: meta.contentType,
          Metadata: { [SHA256_METADATA_KEY]: meta.contentHash },
        }),
        { abortSignal: callOptions?.signal },
      );
    },
  };
}
