import type { MessageId, Timestamp } from './common.js';

/** 의도 분류 -- 닫힌 집합 */
export const INTENTS = ['meeting_request', 'info_request', 'acknowledgement', 'general'] as const;
export type Intent = (typeof INTENTS)[number];

/**
 * 플랜 스텝 식별자
 *
 * 실행 동작이 있는 것은 extract_datetime, create_event 뿐이다.
 * 나머지는 ReplyGenerator가 암묵적으로 소비하는 자리표시자.
 */
export const STEP_IDS = [
  'extract_datetime',
  'create_event',
  'find_answer',
  'draft_reply',
  'draft_ack',
  'draft_general_reply',
] as const;
export type StepId = (typeof STEP_IDS)[number];

/** 실행 동작이 있는 스텝 -- 나열 순서가 곧 의존 순서 */
export const EXECUTABLE_STEP_IDS = ['extract_datetime', 'create_event'] as const;
export type ExecutableStepId = (typeof EXECUTABLE_STEP_IDS)[number];

/** 의도에서 파생된 실행 계획 */
export interface Plan {
  readonly intent: Intent;
  readonly steps: readonly StepId[];
}

/** extract_datetime 출력 */
export interface DateTimeOutput {
  readonly datetime: Timestamp | null;
}

/** create_event 출력 */
export interface CalendarEvent {
  readonly event_id: string;
  readonly status: 'created';
  readonly summary: string;
  readonly datetime: Timestamp | null;
}

/** 실행된 스텝 이름 → 스텝 출력 */
export interface StepOutputs {
  readonly extract_datetime?: DateTimeOutput;
  readonly create_event?: CalendarEvent;
}

export interface ActionRecord extends StepOutputs {
  readonly reply: string;
  readonly sent: boolean;
}

/** 메시지 1건의 최종 처리 결과. 생성 후 동결된다. */
export interface ActionResult {
  readonly plan: Plan;
  readonly actions: ActionRecord;
}

/** 메시지별 처리 상태 (정보용, 저장하지 않음) */
export type TriageState =
  | 'received'
  | 'classified'
  | 'planned'
  | 'steps-executed'
  | 'reply-drafted'
  | 'qa-finalized'
  | 'completed';

/** 배치 처리 결과 엔트리 -- 메시지 단위 실패 격리 */
export type BatchEntry =
  | { readonly messageId: MessageId; readonly ok: true; readonly result: ActionResult }
  | { readonly messageId: MessageId; readonly ok: false; readonly error: Error };

/** 배치 요약 행 */
export interface BatchSummaryRow {
  readonly messageId: MessageId;
  readonly sender: string;
  readonly intent: Intent | null;
  readonly sent: boolean;
}
