import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_API_BASE_URL, DEFAULT_LOG_LEVEL } from './environment';
import { buildRelayConfig, RELAY_CONFIG, RelayConfig } from './relay-config';

/**
 * Global module exposing the frozen {@link RelayConfig} under `RELAY_CONFIG`.
 */
@Global()
@Module({
  providers: [
    {
      provide: RELAY_CONFIG,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService): RelayConfig =>
        buildRelayConfig({
          TELEGRAM_BOT_TOKEN: cfg.getOrThrow<string>('TELEGRAM_BOT_TOKEN'),
          BCN_API_BASE_URL:
            cfg.get<string>('BCN_API_BASE_URL') ?? DEFAULT_API_BASE_URL,
          BCN_BOT_LOG_LEVEL:
            cfg.get<string>('BCN_BOT_LOG_LEVEL') ?? DEFAULT_LOG_LEVEL,
        }),
    },
  ],
  exports: [RELAY_CONFIG],
})
export class RelayConfigModule {}
