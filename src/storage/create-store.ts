/**
 * Build an object store client from the store section of the config.
 */

import type { StoreConfig } from '../schemas/config.js';
import { createFsObjectStore } from './fs-store.js';
import type { ObjectStoreClient } from './object-store.js';
import { createS3ObjectStore } from './s3-store.js';

export function createObjectStore(store: StoreConfig): ObjectStoreClient {
  switch (store.kind) {
    case 's3':
      return createS3ObjectStore({ bucket: store.bucket, region: store.region });
    case 'fs':
      return createFsObjectStore(store.root);
  }
}
