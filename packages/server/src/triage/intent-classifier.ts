// packages/server/src/triage/intent-classifier.ts
import type { Intent } from '@smartmailr/types';

interface IntentRule {
  readonly intent: Exclude<Intent, 'general'>;
  readonly keywords: readonly string[];
}

/**
 * 의도 규칙 테이블 -- 나열 순서가 우선순위. 첫 매칭이 이긴다.
 *
 * 키워드는 부분 문자열로 비교한다 ("meeting"은 "meet"에도 걸린다).
 */
export const INTENT_RULES: readonly IntentRule[] = Object.freeze([
  { intent: 'meeting_request', keywords: ['meet', 'meeting', 'schedule', 'call'] },
  { intent: 'info_request', keywords: ['please', 'could you', 'can you', 'send'] },
  { intent: 'acknowledgement', keywords: ['thanks', 'thank you', 'acknowledge'] },
]);

/** 제목 + 본문(대소문자 무시) → 의도. 어떤 규칙에도 걸리지 않으면 general. */
export function classifyIntent(subject: string, body: string): Intent {
  const text = `${subject} ${body}`.toLowerCase();
  for (const rule of INTENT_RULES) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return rule.intent;
    }
  }
  return 'general';
}
