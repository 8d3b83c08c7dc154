import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { RELAY_CONFIG, RelayConfig } from './config/relay-config';

async function bootstrap() {
  // Loaded here so a failed env validation lands in the catch below.
  const { AppModule } = await import('./app.module');

  // Logs are held back until the configured levels are applied.
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });

  const cfg = app.get<RelayConfig>(RELAY_CONFIG);
  app.useLogger([...cfg.logLevels]);
  app.enableShutdownHooks();

  new Logger('Bootstrap').log(
    `BCN Art Compass Telegram bot started (backend ${cfg.apiBaseUrl}, log level ${cfg.logLevel})`,
  );
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').fatal(
    err instanceof Error ? err.message : String(err),
    err instanceof Error ? err.stack : undefined,
  );
  process.exit(1);
});
