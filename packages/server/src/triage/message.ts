// packages/server/src/triage/message.ts
import type { MailMessage, Timestamp } from '@smartmailr/types';
import { createMessageId, createTimestamp } from '@smartmailr/types';
import { z } from 'zod/v4';
import { MessageValidationError, type MessageIssue } from './errors.js';

/** 수신 시각 -- epoch ms 또는 Date.parse 가능한 문자열(ISO-8601) */
const TimestampInput = z
  .union([
    z.number().int().nonnegative(),
    z.string().refine((s) => !Number.isNaN(Date.parse(s)), 'invalid timestamp'),
  ])
  .transform((v): Timestamp => createTimestamp(typeof v === 'number' ? v : Date.parse(v)));

/** 와이어 형태 -- received_at(스네이크)와 receivedAt(카멜) 모두 허용 */
const RawMailMessageSchema = z.object({
  id: z.number().int().nonnegative(),
  sender: z.string().includes('@', { message: 'sender must contain "@"' }),
  subject: z.string(),
  body: z.string(),
  received_at: TimestampInput.optional(),
  receivedAt: TimestampInput.optional(),
});

/**
 * 비정형 레코드를 MailMessage로 검증/변환
 *
 * 누락 필드를 추측하지 않는다. 실패 시 MessageValidationError.
 */
export function parseMailMessage(raw: unknown): MailMessage {
  const result = RawMailMessageSchema.safeParse(raw);
  if (!result.success) {
    throw new MessageValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)',
        message: issue.message,
      })),
    );
  }

  const { id, sender, subject, body } = result.data;
  const receivedAt = result.data.received_at ?? result.data.receivedAt;
  if (receivedAt === undefined) {
    const missing: MessageIssue = { path: 'received_at', message: 'Required' };
    throw new MessageValidationError([missing]);
  }

  return Object.freeze({ id: createMessageId(id), sender, subject, body, receivedAt });
}
