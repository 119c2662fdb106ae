import { Module, Global, ConsoleLogger, Scope } from '@nestjs/common';
import { ConfigService } from './config.service.js';
import { createConsoleLogger } from './log-levels.js';

@Global()
@Module({
  providers: [
    {
      provide: ConfigService,
      useFactory: async () => {
        const service = new ConfigService();
        await service.loadConfig();
        return service;
      },
    },
    {
      provide: ConsoleLogger,
      scope: Scope.TRANSIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createConsoleLogger(configService.getConfig().logLevel),
    },
  ],
  exports: [ConfigService, ConsoleLogger],
})
export class AppConfigModule {}
