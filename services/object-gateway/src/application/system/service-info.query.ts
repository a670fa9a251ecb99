import { Inject, Injectable } from '@nestjs/common';
import { ObjectFileSystem } from '../objects/object-file-system';

@Injectable()
export class ServiceInfoQuery {
  constructor(@Inject(ObjectFileSystem) private readonly fileSystem: ObjectFileSystem) {}

  getInfo() {
    return {
      service: 'object-gateway',
      kind: 'object-reader',
      status: 'ok',
      objectStore: {
        driver: this.fileSystem.driver,
        namespace: this.fileSystem.namespace,
        chunkSize: this.fileSystem.chunkSize,
      },
      timestamp: new Date().toISOString(),
    };
  }
}
