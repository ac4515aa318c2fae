import { describe, it, expect, vi } from 'vitest';
import { applyDefaults } from '../src/defaults.js';
import { applyEnvOverrides } from '../src/env-overrides.js';

describe('applyEnvOverrides', () => {
  const base = applyDefaults({});

  it('환경변수가 없으면 그대로 반환한다', () => {
    expect(applyEnvOverrides(base, {})).toEqual(base);
  });

  it('로그 레벨을 덮어쓴다 (대소문자 무시)', () => {
    const config = applyEnvOverrides(base, { SMARTMAILR_LOG_LEVEL: 'DEBUG' });
    expect(config.logging.level).toBe('debug');
  });

  it('maxConcurrent를 덮어쓴다', () => {
    const config = applyEnvOverrides(base, { SMARTMAILR_MAX_CONCURRENT: '8' });
    expect(config.pipeline.maxConcurrent).toBe(8);
    expect(config.pipeline.timeoutMs).toBe(10_000);
  });

  it('잘못된 값은 경고 후 무시한다', () => {
    const logger = { warn: vi.fn(), debug: vi.fn() };
    const config = applyEnvOverrides(
      base,
      {
        SMARTMAILR_LOG_LEVEL: 'loud',
        SMARTMAILR_MAX_CONCURRENT: '0',
      },
      logger,
    );
    expect(config).toEqual(base);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Ignoring SMARTMAILR_MAX_CONCURRENT: 0');
  });
});
