import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ValidationPipe, Logger } from '@nestjs/common';
import { USER_PACKAGE_NAME, USER_PROTO_PATH } from '@user-service/proto';
import { appConfig } from './config/app.config';
import type { AppConfig } from './config/app.config';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Hybrid application: HTTP for the account endpoints + gRPC for lookups
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const config = app.get<AppConfig>(appConfig.KEY);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  app.setGlobalPrefix(config.http.globalPrefix);

  // ── gRPC Microservice ───────────────────────────────────
  const grpcUrl = `${config.grpc.host}:${config.grpc.port}`;
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      package: USER_PACKAGE_NAME,
      protoPath: USER_PROTO_PATH,
      url: grpcUrl,
    },
  });

  app.enableShutdownHooks();

  // Start all microservices, then the HTTP server
  await app.startAllMicroservices();
  await app.listen(config.http.port);

  logger.log(`User service gRPC server listening on ${grpcUrl}`);
  logger.log(
    `User service HTTP API on http://localhost:${config.http.port}/${config.http.globalPrefix}`,
  );
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  new Logger('Bootstrap').error(`Failed to start: ${message}`);
  process.exit(1);
});
