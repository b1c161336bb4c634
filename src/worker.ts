import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { ConfigValidationService } from './common/config/config-validation.service';

/**
 * Worker process entry point. Consumes run requests from RabbitMQ; serves
 * no HTTP.
 */
async function bootstrap(): Promise<void> {
  const logger = new Logger('Worker');

  // Read by QualificationRunProcessor when the module initializes
  process.env.WORKER_MODE = 'true';

  logger.log('Starting worker process...');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });
  app.get(ConfigValidationService).validate();

  logger.log(
    `Worker ${process.pid} consuming queue ${process.env.RABBITMQ_QUEUE || 'qualification.run'}`,
  );

  const shutdown = (signal: string): void => {
    logger.log(`Received ${signal}. Gracefully shutting down...`);
    app
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown', error instanceof Error ? error.stack : String(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error: unknown) => {
  new Logger('Worker').error('Worker failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
