// packages/config/src/env-overrides.ts
import type { LogLevel } from '@smartmailr/types';
import { getEnv, getIntEnv } from '@smartmailr/infra';
import type { ResolvedConfig } from './defaults.js';
import type { ConfigDeps } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * 환경변수 오버라이드 (최우선)
 *
 *   SMARTMAILR_LOG_LEVEL        → logging.level
 *   SMARTMAILR_MAX_CONCURRENT   → pipeline.maxConcurrent (>= 1)
 *
 * 범위를 벗어난 값은 경고 후 무시한다.
 */
export function applyEnvOverrides(
  config: ResolvedConfig,
  env: NodeJS.ProcessEnv,
  logger?: ConfigDeps['logger'],
): ResolvedConfig {
  let { logging, pipeline } = config;

  const level = getEnv('LOG_LEVEL', undefined, env)?.toLowerCase();
  if (level !== undefined) {
    if (isLogLevel(level)) {
      logging = { ...logging, level };
    } else {
      logger?.warn(`Ignoring SMARTMAILR_LOG_LEVEL: ${level}`);
    }
  }

  const maxConcurrent = getIntEnv('MAX_CONCURRENT', env);
  if (maxConcurrent !== undefined) {
    if (maxConcurrent >= 1) {
      pipeline = { ...pipeline, maxConcurrent };
    } else {
      logger?.warn(`Ignoring SMARTMAILR_MAX_CONCURRENT: ${maxConcurrent}`);
    }
  }

  return { ...config, logging, pipeline };
}
