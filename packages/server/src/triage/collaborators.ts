// packages/server/src/triage/collaborators.ts
import type { OutboundReply, Timestamp } from '@smartmailr/types';

export interface CalendarEventRequest {
  readonly summary: string;
  readonly datetime: Timestamp | null;
}

export interface CalendarEventReceipt {
  readonly event_id: string;
  readonly status: 'created';
}

/**
 * 캘린더 연동 인터페이스
 *
 * 실제 프로바이더 연동은 이 인터페이스 뒤에서만 바뀐다.
 */
export interface CalendarService {
  createEvent(request: CalendarEventRequest, signal: AbortSignal): Promise<CalendarEventReceipt>;
}

export interface DeliveryAck {
  readonly delivered: boolean;
}

/** 메일 전송 인터페이스 -- 주입하지 않으면 전송은 mock(항상 성공)이다 */
export interface MailTransport {
  send(reply: OutboundReply, signal: AbortSignal): Promise<DeliveryAck>;
}

// 프로세스 전역 시퀀스 -- 인스턴스가 여럿이어도 event_id가 겹치지 않는다
let eventSequence = 0;

/**
 * 자체 완결형 캘린더 스텁
 *
 * event_id: evt_<epoch 초>_<단조 증가 시퀀스>
 */
export class MockCalendarService implements CalendarService {
  constructor(private readonly clock: () => number = Date.now) {}

  async createEvent(
    _request: CalendarEventRequest,
    _signal: AbortSignal,
  ): Promise<CalendarEventReceipt> {
    eventSequence += 1;
    return {
      event_id: `evt_${Math.floor(this.clock() / 1000)}_${eventSequence}`,
      status: 'created',
    };
  }
}
