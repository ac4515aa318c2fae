// packages/server/src/triage/summary.ts
import type {
  ActionResult,
  BatchEntry,
  BatchSummaryRow,
  CalendarEvent,
  MailMessage,
  MessageId,
  Plan,
  Timestamp,
} from '@smartmailr/types';
import { extractErrorInfo } from '@smartmailr/infra';

/** 배치 결과 요약 행 -- 입력 메시지와 인덱스로 짝지음 */
export function summarizeBatch(
  messages: readonly MailMessage[],
  entries: readonly BatchEntry[],
): BatchSummaryRow[] {
  return entries.map((entry, i) => {
    const sender = messages[i]?.sender ?? '';
    if (entry.ok) {
      return {
        messageId: entry.messageId,
        sender,
        intent: entry.result.plan.intent,
        sent: entry.result.actions.sent,
      };
    }
    return { messageId: entry.messageId, sender, intent: null, sent: false };
  });
}

/** 외부 출력용 ActionResult -- 시각은 ISO-8601 문자열 */
export interface ActionReport {
  readonly plan: Plan;
  readonly actions: {
    readonly extract_datetime?: { readonly datetime: string | null };
    readonly create_event?: Omit<CalendarEvent, 'datetime'> & { readonly datetime: string | null };
    readonly reply: string;
    readonly sent: boolean;
  };
}

export type BatchReportEntry =
  | ({ readonly messageId: MessageId } & ActionReport)
  | { readonly messageId: MessageId; readonly error: { readonly code: string; readonly message: string } };

export interface BatchReport {
  readonly results: BatchReportEntry[];
  readonly summary: BatchSummaryRow[];
}

function isoOrNull(ts: Timestamp | null): string | null {
  return ts === null ? null : new Date(ts).toISOString();
}

export function toActionReport(result: ActionResult): ActionReport {
  const { extract_datetime, create_event, reply, sent } = result.actions;
  return {
    plan: result.plan,
    actions: {
      ...(extract_datetime && {
        extract_datetime: { datetime: isoOrNull(extract_datetime.datetime) },
      }),
      ...(create_event && {
        create_event: { ...create_event, datetime: isoOrNull(create_event.datetime) },
      }),
      reply,
      sent,
    },
  };
}

/** CLI 출력 문서: 메시지별 결과 + 요약 */
export function buildBatchReport(
  messages: readonly MailMessage[],
  entries: readonly BatchEntry[],
): BatchReport {
  const results = entries.map((entry): BatchReportEntry => {
    if (entry.ok) {
      return { messageId: entry.messageId, ...toActionReport(entry.result) };
    }
    const { code, message } = extractErrorInfo(entry.error);
    return { messageId: entry.messageId, error: { code, message } };
  });
  return { results, summary: summarizeBatch(messages, entries) };
}
