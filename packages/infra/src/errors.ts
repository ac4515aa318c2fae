// packages/infra/src/errors.ts

/** SmartMailr 기본 에러 — 모든 커스텀 에러의 상위 클래스 */
export class SmartMailrError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      statusCode?: number;
      isOperational?: boolean;
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'SmartMailrError';
    this.code = code;
    this.statusCode = opts.statusCode ?? 500;
    this.isOperational = opts.isOperational ?? true;
    this.details = opts.details;
  }
}

// ──────────────────────────────────────────────
// 도메인 에러 co-location 원칙:
//   ConfigError            → packages/config/src/errors.ts
//   TriageError            → packages/server/src/triage/errors.ts
//   MessageValidationError → packages/server/src/triage/errors.ts
// ──────────────────────────────────────────────

/** 타입 가드 */
export function isSmartMailrError(err: unknown): err is SmartMailrError {
  return err instanceof SmartMailrError;
}

/** unknown → Error 정규화 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** 에러 객체에서 구조화된 정보 추출 */
export function extractErrorInfo(err: unknown): {
  code: string;
  message: string;
  isOperational?: boolean;
  stack?: string;
  cause?: string;
} {
  if (err instanceof SmartMailrError) {
    return {
      code: err.code,
      message: err.message,
      isOperational: err.isOperational,
      stack: err.stack,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    };
  }
  if (err instanceof Error) {
    return { code: 'UNKNOWN', message: err.message, stack: err.stack };
  }
  return { code: 'UNKNOWN', message: String(err) };
}
