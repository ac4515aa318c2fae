// packages/server/src/triage/pipeline-context.ts
import type { Timestamp } from '@smartmailr/types';

/**
 * 메시지 1건 처리 동안만 존재하는 공유 컨텍스트
 *
 * 스텝이 쓴 값을 뒤 스텝과 ReplyGenerator가 읽는다.
 * 메시지 간에 절대 공유하지 않는다.
 */
export interface TriageContext {
  /** extract_datetime이 기록. null이면 시각 단서 없음. */
  datetime?: Timestamp | null;
}

export function createTriageContext(): TriageContext {
  return {};
}
