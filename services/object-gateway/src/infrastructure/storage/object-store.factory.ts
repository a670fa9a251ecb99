import type { ObjectStorePort } from '../../application/objects/ports/object-store.port';
import type { ObjectStoreSettings } from '../config/object-gateway-config.service';
import { AzureBlobObjectStoreAdapter } from './azure-blob-object-store.adapter';
import { InMemoryObjectStoreAdapter } from './in-memory-object-store.adapter';
import { LocalDirectoryObjectStoreAdapter } from './local-directory-object-store.adapter';
import { MinioObjectStoreAdapter } from './minio-object-store.adapter';

export function createObjectStore(config: ObjectStoreSettings): ObjectStorePort {
  switch (config.objectStoreDriver) {
    case 's3':
      return MinioObjectStoreAdapter.fromConfig(config);
    case 'blob':
      return AzureBlobObjectStoreAdapter.fromConfig(config);
    case 'local':
      return LocalDirectoryObjectStoreAdapter.fromConfig(config);
    case 'memory':
      return new InMemoryObjectStoreAdapter({ namespace: config.objectStoreNamespace });
  }
}
