import 'reflect-metadata';
import { AppModule } from '@/app.module';
import { getErrorMessage } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { CustomLoggerService } from '@logging/logger.service';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

process.on('unhandledRejection', reason => {
  Logger.error(`Unhandled Rejection: ${getErrorMessage(reason)}`, 'Process');
});

async function bootstrap(): Promise<void> {
  // Configuration and client errors reject here instead of aborting inside Nest
  const app = await NestFactory.create(AppModule, { abortOnError: false });

  const customLogger = app.get(CustomLoggerService);
  app.useLogger(customLogger);
  app.setGlobalPrefix('api');

  const configService = app.get(ConfigService);
  const port = configService.getPort();

  // Runs the credential check, then schedules the sampler and reporter
  await app.listen(port, '0.0.0.0');

  customLogger.logStartupInfo(port, configService.getEnvironment());
  customLogger.log(`Health endpoint available at /api/health`, 'Bootstrap');

  const shutdown = async (signal: string): Promise<void> => {
    customLogger.log(`Received ${signal}`, 'Bootstrap');
    customLogger.logShutdownInfo();
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

bootstrap().catch(error => {
  Logger.error(`Failed to start application: ${getErrorMessage(error)}`, 'Bootstrap');
  process.exit(1);
});
