import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Transport, MicroserviceOptions } from '@nestjs/microservices';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { ConfigService } from '@nestjs/config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  app.enableShutdownHooks();
  const logger = app.get(Logger);

  const configService = app.get(ConfigService);
  const tcpPort = configService.get<number>('INDEXING_TCP_PORT', 4003);

  // TCP microservice for inter-service communication
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.TCP,
    options: {
      host: '0.0.0.0',
      port: tcpPort,
    },
  });

  await app.startAllMicroservices();
  logger.log(`TCP microservice is running on port ${tcpPort}`);

  const port = configService.get<number>('INDEXING_PORT', 50052);
  await app.listen(port);
  logger.log(`Indexing service is running on http://localhost:${port}`);
}

void bootstrap();
