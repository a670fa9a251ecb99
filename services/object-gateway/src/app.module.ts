import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ObjectFileSystem } from './application/objects/object-file-system';
import { ObjectsApplicationService } from './application/objects/objects.application.service';
import { OBJECT_STORE_PORT, type ObjectStorePort } from './application/objects/ports/object-store.port';
import { ServiceInfoQuery } from './application/system/service-info.query';
import {
  OBJECT_GATEWAY_ENV_FILE_PATHS,
  ObjectGatewayConfigService,
  validateObjectGatewayEnvironment,
} from './infrastructure/config/object-gateway-config.service';
import { createObjectStore } from './infrastructure/storage/object-store.factory';
import { ObjectsController } from './presentation/http/objects/objects.controller';
import { AppController } from './presentation/http/system/app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: OBJECT_GATEWAY_ENV_FILE_PATHS,
      validate: validateObjectGatewayEnvironment,
    }),
  ],
  controllers: [AppController, ObjectsController],
  providers: [
    ObjectGatewayConfigService,
    {
      provide: OBJECT_STORE_PORT,
      useFactory: (config: ObjectGatewayConfigService) => createObjectStore(config),
      inject: [ObjectGatewayConfigService],
    },
    {
      provide: ObjectFileSystem,
      useFactory: (store: ObjectStorePort, config: ObjectGatewayConfigService) =>
        new ObjectFileSystem(store, { chunkSize: config.readerChunkSize }),
      inject: [OBJECT_STORE_PORT, ObjectGatewayConfigService],
    },
    ObjectsApplicationService,
    ServiceInfoQuery,
  ],
})
export class AppModule {}
