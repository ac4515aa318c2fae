// packages/config/src/validation.ts
import type { SmartMailrConfig, ConfigValidationIssue } from '@smartmailr/types';
import { SECTION_SCHEMAS, SmartMailrConfigSchema } from './zod-schema.js';

export interface ValidationResult {
  valid: boolean;
  config: SmartMailrConfig;
  issues: ConfigValidationIssue[];
}

/**
 * Zod 기반 검증
 *
 * 1. safeParse로 전체 스키마 검증
 * 2. 실패 시 이슈를 수집하고, 섹션 단위로 통과한 부분만 살린다
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = SmartMailrConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data, issues: [] };
  }

  const issues: ConfigValidationIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)',
    message: issue.message,
    severity: 'error',
  }));

  return { valid: false, config: salvageSections(raw), issues };
}

/** 섹션별로 개별 검증하여 유효한 섹션만 남긴다 */
function salvageSections(raw: unknown): SmartMailrConfig {
  if (typeof raw !== 'object' || raw === null) {
    return {};
  }
  const source = new Map(Object.entries(raw));
  const config: SmartMailrConfig = {};

  const logging = SECTION_SCHEMAS.logging.safeParse(source.get('logging'));
  if (logging.success) {
    config.logging = logging.data;
  }
  const reply = SECTION_SCHEMAS.reply.safeParse(source.get('reply'));
  if (reply.success) {
    config.reply = reply.data;
  }
  const pipeline = SECTION_SCHEMAS.pipeline.safeParse(source.get('pipeline'));
  if (pipeline.success) {
    config.pipeline = pipeline.data;
  }
  return config;
}
