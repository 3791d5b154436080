import { CustomLoggerService } from '@logging/logger.service';
import { Global, Module } from '@nestjs/common';

@Global()
@Module({
  providers: [CustomLoggerService],
  exports: [CustomLoggerService],
})
export class LoggerModule {}
