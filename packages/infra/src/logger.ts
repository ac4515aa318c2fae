// packages/infra/src/logger.ts
import type { LogLevel } from '@smartmailr/types';
import { Logger as TsLogger } from 'tslog';
import { getContext } from './context.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  console?: {
    pretty?: boolean; // 기본: !isCI
  };
  redactKeys?: string[];
  autoInjectContext?: boolean; // 기본: true
}

export interface SmartMailrLogger {
  trace(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  fatal(msg: string, ...args: unknown[]): void;
  child(name: string): SmartMailrLogger;
}

const DEFAULT_REDACT_KEYS = ['token', 'password', 'secret', 'apiKey', 'api_key', 'authorization'];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** SmartMailr 로거 팩토리 (기본 구현) */
export function createLogger(config: LoggerConfig): SmartMailrLogger {
  const isCI = process.env.CI === 'true';
  const tsLogger = new TsLogger<unknown>({
    name: config.name,
    minLevel: LOG_LEVEL_MAP[config.level ?? 'info'],
    type: (config.console?.pretty ?? !isCI) ? 'pretty' : 'json',
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    hideLogPositionForProduction: true,
  });

  return wrapLogger(tsLogger, config.autoInjectContext ?? true);
}

/** tslog 인스턴스를 SmartMailrLogger로 래핑 */
function wrapLogger(tsLogger: TsLogger<unknown>, injectContext: boolean): SmartMailrLogger {
  const withCtx = (args: unknown[]): unknown[] => {
    if (!injectContext) {
      return args;
    }
    const ctx = getContext();
    if (!ctx) {
      return args;
    }
    return [{ _ctx: { requestId: ctx.requestId, messageId: ctx.messageId } }, ...args];
  };

  return {
    trace: (msg, ...args) => tsLogger.trace(msg, ...withCtx(args)),
    debug: (msg, ...args) => tsLogger.debug(msg, ...withCtx(args)),
    info: (msg, ...args) => tsLogger.info(msg, ...withCtx(args)),
    warn: (msg, ...args) => tsLogger.warn(msg, ...withCtx(args)),
    error: (msg, ...args) => tsLogger.error(msg, ...withCtx(args)),
    fatal: (msg, ...args) => tsLogger.fatal(msg, ...withCtx(args)),
    child: (name: string) => wrapLogger(tsLogger.getSubLogger({ name }), injectContext),
  };
}
