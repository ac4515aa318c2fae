import type { LogLevel, SmartMailrConfig } from '@smartmailr/types';

/** 기본값이 모두 채워진 설정 */
export interface ResolvedConfig {
  readonly logging: { readonly level: LogLevel; readonly pretty?: boolean };
  readonly reply: { readonly signOff: string; readonly signatureName: string };
  readonly pipeline: { readonly maxConcurrent: number; readonly timeoutMs: number };
}

/**
 * 불변 기본값
 *
 * Zod .default()를 쓰지 않는다. 기본값 적용은 로드 파이프라인의 별도 단계.
 */
const DEFAULTS = Object.freeze<ResolvedConfig>({
  logging: { level: 'info' },
  reply: { signOff: 'Best,', signatureName: 'SmartMailr' },
  pipeline: { maxConcurrent: 4, timeoutMs: 10_000 },
});

/** 기본값을 유저 설정에 병합 (유저 값 우선) */
export function applyDefaults(userConfig: SmartMailrConfig): ResolvedConfig {
  return {
    logging: { ...DEFAULTS.logging, ...userConfig.logging },
    reply: { ...DEFAULTS.reply, ...userConfig.reply },
    pipeline: { ...DEFAULTS.pipeline, ...userConfig.pipeline },
  };
}

/** 기본값 조회 (읽기 전용) */
export function getDefaults(): ResolvedConfig {
  return DEFAULTS;
}
