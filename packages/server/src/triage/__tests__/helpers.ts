import type { SmartMailrLogger } from '@smartmailr/infra';
import type { MailMessage } from '@smartmailr/types';
import { createMessageId, createTimestamp } from '@smartmailr/types';
import { vi } from 'vitest';

/** 기준 시각: 2026-10-19 09:30 (로컬) */
export const NOW = new Date(2026, 9, 19, 9, 30).getTime();
/** 기준일 다음 날 16:00 (로컬) */
export const TOMORROW_4PM = new Date(2026, 9, 20, 16, 0, 0, 0).getTime();
/** 기준일 16:00 (로컬) */
export const TODAY_4PM = new Date(2026, 9, 19, 16, 0, 0, 0).getTime();

export function makeLogger(): SmartMailrLogger {
  const logger: SmartMailrLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
}

export function makeMessage(overrides: Partial<MailMessage> = {}): MailMessage {
  return {
    id: createMessageId(1),
    sender: 'alice@example.com',
    subject: 'Meeting?',
    body: 'Hi, can we meet tomorrow at 4 PM to discuss the dataset?',
    receivedAt: createTimestamp(NOW),
    ...overrides,
  };
}
