import type { BatchEntry } from '@smartmailr/types';
import { createMessageId } from '@smartmailr/types';
import { describe, it, expect } from 'vitest';
import { MockCalendarService } from '../collaborators.js';
import { TriageError } from '../errors.js';
import { TriageOrchestrator } from '../orchestrator.js';
import { DEFAULT_SIGNATURE } from '../reply-generator.js';
import { buildBatchReport, summarizeBatch, toActionReport } from '../summary.js';
import { NOW, TOMORROW_4PM, makeLogger, makeMessage } from './helpers.js';

function makeOrchestrator(): TriageOrchestrator {
  return new TriageOrchestrator(
    { signature: DEFAULT_SIGNATURE, timeoutMs: 10_000, maxConcurrent: 2 },
    { calendar: new MockCalendarService(() => NOW), logger: makeLogger(), clock: () => NOW },
  );
}

describe('summarizeBatch', () => {
  it('성공/실패 엔트리를 요약 행으로 만든다', async () => {
    const ok = makeMessage();
    const broken = makeMessage({ id: createMessageId(5), sender: 'erin@example.com' });
    const entries: BatchEntry[] = [
      { messageId: ok.id, ok: true, result: await makeOrchestrator().process(ok) },
      { messageId: broken.id, ok: false, error: new Error('boom') },
    ];

    expect(summarizeBatch([ok, broken], entries)).toEqual([
      { messageId: 1, sender: 'alice@example.com', intent: 'meeting_request', sent: true },
      { messageId: 5, sender: 'erin@example.com', intent: null, sent: false },
    ]);
  });
});

describe('toActionReport', () => {
  it('시각을 ISO-8601 문자열로 바꾼다', async () => {
    const result = await makeOrchestrator().process(makeMessage());
    const iso = new Date(TOMORROW_4PM).toISOString();

    const report = toActionReport(result);

    expect(report.actions.extract_datetime).toEqual({ datetime: iso });
    expect(report.actions.create_event).toEqual({
      event_id: result.actions.create_event?.event_id,
      status: 'created',
      summary: 'Meeting with alice@example.com',
      datetime: iso,
    });
    expect(Object.keys(report.actions)).toEqual([
      'extract_datetime',
      'create_event',
      'reply',
      'sent',
    ]);
  });

  it('시각 단서가 없으면 null을 유지한다', async () => {
    const result = await makeOrchestrator().process(
      makeMessage({ subject: 'Sync', body: 'Can we meet next week?' }),
    );
    expect(toActionReport(result).actions.extract_datetime).toEqual({ datetime: null });
  });

  it('실행 스텝이 없으면 reply와 sent만 남는다', async () => {
    const result = await makeOrchestrator().process(
      makeMessage({ subject: 'Thanks', body: 'Thanks for the update!' }),
    );
    expect(toActionReport(result)).toEqual({
      plan: { intent: 'acknowledgement', steps: ['draft_ack'] },
      actions: {
        reply: 'Hi alice,\nThanks for the update, noted.\nBest,\nSmartMailr',
        sent: true,
      },
    });
  });
});

describe('buildBatchReport', () => {
  it('실패 엔트리는 에러 코드와 메시지로 남긴다', () => {
    const message = makeMessage({ id: createMessageId(8) });
    const error = new TriageError('Calendar service failed for message 8', 'CALENDAR_FAILED');

    const report = buildBatchReport([message], [{ messageId: message.id, ok: false, error }]);

    expect(report).toEqual({
      results: [
        {
          messageId: 8,
          error: { code: 'CALENDAR_FAILED', message: 'Calendar service failed for message 8' },
        },
      ],
      summary: [{ messageId: 8, sender: 'alice@example.com', intent: null, sent: false }],
    });
  });

  it('결과는 JSON 직렬화 시 epoch 숫자 대신 ISO 문자열을 담는다', async () => {
    const message = makeMessage();
    const entries = await makeOrchestrator().processBatch([message]);

    const json: unknown = JSON.parse(JSON.stringify(buildBatchReport([message], entries)));

    expect(json).toMatchObject({
      results: [{ actions: { create_event: { datetime: new Date(TOMORROW_4PM).toISOString() } } }],
    });
  });
});
