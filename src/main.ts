import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';

const DEFAULT_PORT = 3000;

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Use pino logger for all NestJS logs
  app.useLogger(app.get(PinoLogger));

  const logger = new Logger('Bootstrap');

  // Drain album assembly tasks and close Redis on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const port = process.env.PORT || DEFAULT_PORT;
  await app.listen(port);

  logger.log(`Feedback relay bot is running on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start feedback relay bot', error);
  process.exit(1);
});
