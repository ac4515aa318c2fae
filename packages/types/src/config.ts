import type { LogLevel } from './common.js';

/** SmartMailr 루트 설정 타입 */
export interface SmartMailrConfig {
  logging?: LoggingConfig;
  reply?: ReplyConfig;
  pipeline?: PipelineConfig;
}

export interface LoggingConfig {
  level?: LogLevel;
  pretty?: boolean;
}

/** 회신 서명 -- 두 줄 (signOff, signatureName) */
export interface ReplyConfig {
  signOff?: string;
  signatureName?: string;
}

export interface PipelineConfig {
  /** 배치 처리 시 동시 처리 메시지 수 */
  maxConcurrent?: number;
  /** 메시지 1건 처리 타임아웃 */
  timeoutMs?: number;
}

/** 설정 검증 이슈 */
export interface ConfigValidationIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}
