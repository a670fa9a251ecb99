import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { createJsonLogEntry } from '@object-fs/shared';
import { AppModule } from './app.module';
import { ObjectFileSystem } from './application/objects/object-file-system';
import { ObjectGatewayConfigService } from './infrastructure/config/object-gateway-config.service';
import { HttpExceptionFilter } from './presentation/http/common/http-exception.filter';

const SERVICE_NAME = 'object-gateway';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableCors();
  app.useGlobalFilters(new HttpExceptionFilter());
  const config = app.get(ObjectGatewayConfigService);
  const fileSystem = app.get(ObjectFileSystem);
  const port = config.port;

  app.enableShutdownHooks();
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(JSON.stringify(createJsonLogEntry({
    level: 'info',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} listening on port ${port}`,
    correlationId: 'system',
    namespace: fileSystem.namespace,
    metadata: {
      port,
      driver: fileSystem.driver,
      chunkSize: fileSystem.chunkSize,
    },
  })));
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(JSON.stringify(createJsonLogEntry({
    level: 'error',
    service: SERVICE_NAME,
    message: `Failed to start ${SERVICE_NAME}`,
    correlationId: 'system',
    error,
  })));
  process.exitCode = 1;
});
