import { ConfigService } from '@config/config.service';
import { Global, Module } from '@nestjs/common';

/**
 * Global module exposing the environment-backed configuration
 */
@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: () => new ConfigService(),
    },
  ],
  exports: [ConfigService],
})
export class ConfigModule {}
