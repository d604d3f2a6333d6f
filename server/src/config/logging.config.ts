/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LEVELS: readonly LogLevelName[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function parseLevel(raw: string | undefined, fallback: LogLevelName): LogLevelName {
  const match = LEVELS.find((level) => level === raw);
  return match ?? fallback;
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';
  const isTest = env.NODE_ENV === 'test';

  return {
    // Tests stay quiet unless LOG_LEVEL asks otherwise
    level: parseLevel(env.LOG_LEVEL, isTest ? 'silent' : 'info'),
    pretty: env.LOG_PRETTY === 'true' || (isDev && !isTest),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,x-api-key,key,token,password,apiKey,api_key,secret,openaiApiKey')
      .split(',').map(f => f.trim())
  };
}
