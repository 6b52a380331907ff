import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the submission relay
 * SQS consumer only, no HTTP server
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const logger = app.get(PinoLoggerService).forContext('Bootstrap');

  app.useLogger(logger);

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.get('sqs', { infer: true });
  const submissionConfig = configService.get('submission', { infer: true });

  app.enableShutdownHooks();

  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, stopping consumer...');
    await app.close();
    logger.info('Consumer stopped, application shut down gracefully');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdownHandler(signal).catch((error: unknown) => {
      logger.error(
        { signal, error: error instanceof Error ? error.message : String(error) },
        'Shutdown failed',
      );
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      queue: sqsConfig.submissionsUrl,
      uploadFailureMode: submissionConfig.uploadFailureMode,
    },
    'Submission relay started - listening to SQS queue',
  );

  // The SQS consumer starts through the @ssut/nestjs-sqs lifecycle hooks
}

bootstrap().catch((error) => {
  console.error('Failed to start submission relay:', error);
  process.exit(1);
});
