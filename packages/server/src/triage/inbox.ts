// packages/server/src/triage/inbox.ts
import type { MailMessage } from '@smartmailr/types';
import * as fs from 'node:fs';
import { MessageValidationError } from './errors.js';
import { parseMailMessage } from './message.js';

/** JSON 배열 → 검증된 MailMessage 목록. 한 건이라도 잘못되면 전체 거부. */
export function parseInbox(raw: unknown): MailMessage[] {
  if (!Array.isArray(raw)) {
    throw new MessageValidationError([{ path: '(root)', message: 'inbox must be a JSON array' }]);
  }
  return raw.map((item: unknown, index: number) => {
    try {
      return parseMailMessage(item);
    } catch (error) {
      if (error instanceof MessageValidationError) {
        throw new MessageValidationError(
          error.issues.map((issue) => ({ ...issue, path: `[${index}].${issue.path}` })),
        );
      }
      throw error;
    }
  });
}

export function loadInboxFile(filePath: string): MailMessage[] {
  const content = fs.readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return parseInbox(raw);
}
