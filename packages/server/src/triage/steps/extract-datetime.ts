// packages/server/src/triage/steps/extract-datetime.ts
import type { DateTimeOutput } from '@smartmailr/types';
import { createTimestamp } from '@smartmailr/types';

interface TemporalCue {
  readonly phrases: readonly string[];
  /** 기준일로부터의 일 수 */
  readonly dayOffset: number;
}

/** 모든 단서는 이 시각(로컬 16:00:00.000)으로 확정된다 */
const MEETING_HOUR = 16;

/** 나열 순서가 우선순위 */
const TEMPORAL_CUES: readonly TemporalCue[] = [
  { phrases: ['tomorrow'], dayOffset: 1 },
  { phrases: ['today'], dayOffset: 0 },
  { phrases: ['4 pm', '4pm'], dayOffset: 1 },
];

export interface ExtractDateTimeOptions {
  /** 기준 시각 (epoch ms) */
  readonly now: number;
}

/**
 * 본문에서 시각 단서를 찾아 로컬 시간 기준 16:00:00.000으로 확정한다.
 *
 * 단서가 없으면 `{ datetime: null }` -- 실패가 아니라 정상 결과다.
 */
export function extractDateTime(body: string, options: ExtractDateTimeOptions): DateTimeOutput {
  const text = body.toLowerCase();
  const cue = TEMPORAL_CUES.find((c) => c.phrases.some((phrase) => text.includes(phrase)));
  if (!cue) {
    return { datetime: null };
  }

  const when = new Date(options.now);
  when.setDate(when.getDate() + cue.dayOffset);
  when.setHours(MEETING_HOUR, 0, 0, 0);
  return { datetime: createTimestamp(when.getTime()) };
}
