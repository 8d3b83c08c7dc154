import type { LogLevel } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsString, IsUrl, validateSync } from 'class-validator';

export const DEFAULT_API_BASE_URL = 'http://localhost:8000';
export const DEFAULT_LOG_LEVEL = 'INFO';

export const TOKEN_MISSING_MESSAGE =
  'TELEGRAM_BOT_TOKEN is not set. Configure it in the environment or .env file.';

/**
 * Environment read by the relay. Unknown keys in `process.env` are carried
 * along untouched; only these three are checked.
 */
export class EnvironmentVariables {
  @IsString({ message: TOKEN_MISSING_MESSAGE })
  @IsNotEmpty({ message: TOKEN_MISSING_MESSAGE })
  TELEGRAM_BOT_TOKEN!: string;

  // Compose service names (bcn_api) are valid hosts.
  @IsUrl(
    {
      require_tld: false,
      require_protocol: true,
      protocols: ['http', 'https'],
      allow_underscores: true,
    },
    { message: 'BCN_API_BASE_URL must be an http(s) URL' },
  )
  BCN_API_BASE_URL: string = DEFAULT_API_BASE_URL;

  @IsString()
  BCN_BOT_LOG_LEVEL: string = DEFAULT_LOG_LEVEL;
}

/** `validate` hook for `ConfigModule.forRoot`. Throws on the first bad read. */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(env, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = new Set<string>();
    for (const error of errors) {
      for (const message of Object.values(error.constraints ?? {})) {
        messages.add(message);
      }
    }
    throw new Error(`Invalid environment: ${[...messages].join('; ')}`);
  }

  return env;
}

// Nest levels, most severe first.
const LEVEL_ORDER: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'log',
  'debug',
  'verbose',
];

const LEVEL_THRESHOLDS: ReadonlyMap<string, LogLevel> = new Map<string, LogLevel>([
  ['NOTSET', 'verbose'],
  ['DEBUG', 'debug'],
  ['INFO', 'log'],
  ['WARNING', 'warn'],
  ['WARN', 'warn'],
  ['ERROR', 'error'],
  ['CRITICAL', 'fatal'],
  ['FATAL', 'fatal'],
]);

/**
 * Normalizes a verbosity name (`debug`, `Warning`, ...). Names the relay does
 * not know fall back to INFO.
 */
export function normalizeLogLevelName(name: string): string {
  const upper = name.trim().toUpperCase();
  return LEVEL_THRESHOLDS.has(upper) ? upper : DEFAULT_LOG_LEVEL;
}

/** Nest log levels enabled for a verbosity name. */
export function resolveLogLevels(name: string): LogLevel[] {
  const threshold = LEVEL_THRESHOLDS.get(normalizeLogLevelName(name)) ?? 'log';
  return LEVEL_ORDER.slice(0, LEVEL_ORDER.indexOf(threshold) + 1);
}
