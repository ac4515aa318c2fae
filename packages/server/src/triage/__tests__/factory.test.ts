import { applyDefaults, getDefaults } from '@smartmailr/config';
import { describe, it, expect } from 'vitest';
import { createTriageOrchestrator, resolveTriageOptions } from '../factory.js';
import { NOW, TOMORROW_4PM, makeLogger, makeMessage } from './helpers.js';

describe('resolveTriageOptions', () => {
  it('기본 설정 → 기본 옵션', () => {
    expect(resolveTriageOptions(getDefaults())).toEqual({
      signature: { signOff: 'Best,', name: 'SmartMailr' },
      timeoutMs: 10_000,
      maxConcurrent: 4,
    });
  });
});

describe('createTriageOrchestrator', () => {
  it('설정의 서명을 따른다', async () => {
    const config = applyDefaults({
      reply: { signOff: 'Regards,', signatureName: 'Ops Desk' },
    });
    const orchestrator = createTriageOrchestrator(config, {
      logger: makeLogger(),
      clock: () => NOW,
    });

    const result = await orchestrator.process(makeMessage());

    expect(result.actions.extract_datetime).toEqual({ datetime: TOMORROW_4PM });
    expect(result.actions.reply).toBe(
      [
        'Hi alice,',
        "Thanks, that works for me. I've scheduled the meeting for 2026-10-20 04:00 PM.",
        'Regards,',
        'Ops Desk',
      ].join('\n'),
    );
  });

  it('기본 관측자는 triage 자식 로거를 쓴다', () => {
    const logger = makeLogger();
    createTriageOrchestrator(getDefaults(), { logger });
    expect(logger.child).toHaveBeenCalledWith('triage');
  });
});
