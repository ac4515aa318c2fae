// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';

/** 서명 한 줄 -- QA의 줄 단위 트림 이후에도 그대로 남아야 한다 */
const SignatureLine = z
  .string()
  .trim()
  .min(1)
  .regex(/^[^\r\n]+$/, 'must be a single line');

/** 로깅 설정 스키마 */
const LoggingSchema = z.strictObject({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),
  pretty: z.boolean().optional(),
});

/** 회신 서명 스키마 */
const ReplySchema = z.strictObject({
  signOff: SignatureLine.optional(),
  signatureName: SignatureLine.optional(),
});

/** 파이프라인 스키마 */
const PipelineSchema = z.strictObject({
  maxConcurrent: z.number().int().min(1).max(64).optional(),
  timeoutMs: z.number().int().min(1).optional(),
});

/** 섹션별 스키마 -- 부분 복구(salvage)에 사용 */
export const SECTION_SCHEMAS = {
  logging: LoggingSchema,
  reply: ReplySchema,
  pipeline: PipelineSchema,
} as const;

/** SmartMailr 루트 설정 스키마 */
export const SmartMailrConfigSchema = z.strictObject({
  logging: LoggingSchema.optional(),
  reply: ReplySchema.optional(),
  pipeline: PipelineSchema.optional(),
});

export type ValidatedSmartMailrConfig = z.infer<typeof SmartMailrConfigSchema>;
