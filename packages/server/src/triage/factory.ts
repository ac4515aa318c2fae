// packages/server/src/triage/factory.ts
import type { ResolvedConfig } from '@smartmailr/config';
import { MockCalendarService } from './collaborators.js';
import { DefaultTriageObserver } from './observer.js';
import {
  TriageOrchestrator,
  type TriageDependencies,
  type TriageOptions,
} from './orchestrator.js';

/** 설정 → TriageOptions */
export function resolveTriageOptions(config: ResolvedConfig): TriageOptions {
  return {
    signature: { signOff: config.reply.signOff, name: config.reply.signatureName },
    timeoutMs: config.pipeline.timeoutMs,
    maxConcurrent: config.pipeline.maxConcurrent,
  };
}

/**
 * 기본 구성의 오케스트레이터
 *
 * calendar 미지정 시 MockCalendarService, observer 미지정 시 로거 기반 기본 관측자.
 */
export function createTriageOrchestrator(
  config: ResolvedConfig,
  deps: Pick<TriageDependencies, 'logger'> & Partial<TriageDependencies>,
): TriageOrchestrator {
  const clock = deps.clock ?? Date.now;
  return new TriageOrchestrator(resolveTriageOptions(config), {
    ...deps,
    clock,
    calendar: deps.calendar ?? new MockCalendarService(clock),
    observer: deps.observer ?? new DefaultTriageObserver(deps.logger.child('triage')),
  });
}
