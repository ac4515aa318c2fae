// packages/server/src/triage/errors.ts
import { SmartMailrError } from '@smartmailr/infra';

/** 트리아지 에러 코드 */
export type TriageErrorCode =
  | 'INVALID_MESSAGE'
  | 'CALENDAR_FAILED'
  | 'DELIVERY_FAILED'
  | 'STEP_ORDER_VIOLATION'
  | 'ABORTED';

export class TriageError extends SmartMailrError {
  declare readonly code: TriageErrorCode;

  constructor(
    message: string,
    code: TriageErrorCode,
    opts?: { statusCode?: number; cause?: Error; details?: Record<string, unknown> },
  ) {
    super(message, code, {
      statusCode: 500,
      isOperational: true,
      ...opts,
    });
    this.name = 'TriageError';
  }
}

/** 메시지 검증 이슈 */
export interface MessageIssue {
  readonly path: string;
  readonly message: string;
}

/** 필수 필드 누락 등 -- 파이프라인 진입 전에 거부 */
export class MessageValidationError extends TriageError {
  readonly issues: readonly MessageIssue[];

  constructor(issues: readonly MessageIssue[]) {
    super(
      `Invalid message: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      'INVALID_MESSAGE',
      { statusCode: 400, details: { issues } },
    );
    this.name = 'MessageValidationError';
    this.issues = issues;
  }
}
