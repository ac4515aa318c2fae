// packages/config/src/errors.ts
import { SmartMailrError } from '@smartmailr/infra';

/** 설정 시스템 기본 에러 */
export class ConfigError extends SmartMailrError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'CONFIG_ERROR', opts);
    this.name = 'ConfigError';
  }
}
