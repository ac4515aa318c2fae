// @smartmailr/infra — barrel export

// 에러
export { SmartMailrError, isSmartMailrError, toError, extractErrorInfo } from './errors.js';

// 컨텍스트
export { runWithContext, getContext, type RequestContext } from './context.js';

// 환경
export { getEnv, getIntEnv } from './env.js';

// 로깅
export { createLogger, type LoggerConfig, type SmartMailrLogger } from './logger.js';

// 동시성
export { ConcurrencyLimiter, mapWithConcurrency, type LimiterHandle } from './concurrency-limit.js';

// 프로세스
export { isMain } from './is-main.js';
