import type { LogLevel } from '@nestjs/common';
import {
  EnvironmentVariables,
  normalizeLogLevelName,
  resolveLogLevels,
} from './environment';

export const RELAY_CONFIG = 'RELAY_CONFIG';

/** Settings resolved once at startup and shared read-only. */
export interface RelayConfig {
  readonly telegramToken: string;
  readonly apiBaseUrl: string;
  readonly logLevel: string;
  readonly logLevels: readonly LogLevel[];
}

export type RelayEnvironment = Pick<
  EnvironmentVariables,
  'TELEGRAM_BOT_TOKEN' | 'BCN_API_BASE_URL' | 'BCN_BOT_LOG_LEVEL'
>;

export function buildRelayConfig(env: RelayEnvironment): RelayConfig {
  const logLevel = normalizeLogLevelName(env.BCN_BOT_LOG_LEVEL);
  return Object.freeze({
    telegramToken: env.TELEGRAM_BOT_TOKEN,
    apiBaseUrl: env.BCN_API_BASE_URL,
    logLevel,
    logLevels: Object.freeze(resolveLogLevels(logLevel)),
  });
}
