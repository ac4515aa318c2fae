// packages/server/src/triage/reply-generator.ts
import type { Intent, MailMessage, Timestamp } from '@smartmailr/types';
import type { TriageContext } from './pipeline-context.js';

/** 두 줄 고정 서명 */
export interface Signature {
  readonly signOff: string;
  readonly name: string;
}

export const DEFAULT_SIGNATURE: Signature = Object.freeze({ signOff: 'Best,', name: 'SmartMailr' });

/** 주소의 로컬 파트 ('@' 앞) */
export function senderLocalPart(sender: string): string {
  const at = sender.indexOf('@');
  return at === -1 ? sender : sender.slice(0, at);
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** `YYYY-MM-DD hh:mm AM|PM` (로컬 시간, 12시간제) */
export function formatMeetingTime(ts: Timestamp): string {
  const d = new Date(ts);
  const hours = d.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const meridiem = hours < 12 ? 'AM' : 'PM';
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(hour12)}:${pad2(d.getMinutes())} ${meridiem}`
  );
}

const REPLY_TEMPLATES: Readonly<Record<Intent, (ctx: TriageContext) => string>> = {
  meeting_request: (ctx) => {
    const when = ctx.datetime != null ? formatMeetingTime(ctx.datetime) : 'a time';
    return `Thanks, that works for me. I've scheduled the meeting for ${when}.`;
  },
  info_request: () =>
    'Thanks for reaching out. I will gather the information and send it shortly.',
  acknowledgement: () => 'Thanks for the update, noted.',
  general: () => "Thanks for your message. I'll get back to you soon.",
};

/** 의도별 템플릿 렌더링 (인사 + 본문 + 서명). 부수효과 없음. */
export function generateReply(
  intent: Intent,
  message: Pick<MailMessage, 'sender'>,
  context: TriageContext,
  signature: Signature = DEFAULT_SIGNATURE,
): string {
  return [
    `Hi ${senderLocalPart(message.sender)},`,
    '',
    REPLY_TEMPLATES[intent](context),
    '',
    signature.signOff,
    signature.name,
  ].join('\n');
}
