// packages/server/src/triage/planner.ts
import type { Intent, Plan, StepId } from '@smartmailr/types';

/** 의도별 고정 스텝 시퀀스 */
export const PLAN_TABLE: Readonly<Record<Intent, readonly StepId[]>> = Object.freeze({
  meeting_request: Object.freeze<StepId[]>(['extract_datetime', 'create_event', 'draft_reply']),
  info_request: Object.freeze<StepId[]>(['find_answer', 'draft_reply']),
  acknowledgement: Object.freeze<StepId[]>(['draft_ack']),
  general: Object.freeze<StepId[]>(['draft_general_reply']),
});

/** 순수 테이블 조회. 같은 의도는 항상 같은 시퀀스를 받는다. */
export function planForIntent(intent: Intent): Plan {
  return Object.freeze({ intent, steps: PLAN_TABLE[intent] });
}
