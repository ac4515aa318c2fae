// packages/server/src/triage/steps/create-event.ts
import type { CalendarEvent, MailMessage, Timestamp } from '@smartmailr/types';
import { toError } from '@smartmailr/infra';
import type { CalendarService } from '../collaborators.js';
import { TriageError } from '../errors.js';

export function meetingSummary(message: MailMessage): string {
  return `Meeting with ${message.sender}`;
}

/**
 * 캘린더 협력자를 호출해 이벤트 레코드를 만든다.
 *
 * 협력자 실패는 CALENDAR_FAILED로 호출자에게 드러낸다.
 */
export async function createEvent(
  calendar: CalendarService,
  message: MailMessage,
  datetime: Timestamp | null,
  signal: AbortSignal,
): Promise<CalendarEvent> {
  const summary = meetingSummary(message);
  try {
    const receipt = await calendar.createEvent({ summary, datetime }, signal);
    return { event_id: receipt.event_id, status: receipt.status, summary, datetime };
  } catch (error) {
    throw new TriageError(`Calendar service failed for message ${message.id}`, 'CALENDAR_FAILED', {
      statusCode: 502,
      cause: toError(error),
      details: { messageId: message.id },
    });
  }
}
