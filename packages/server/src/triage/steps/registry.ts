// packages/server/src/triage/steps/registry.ts
import type {
  CalendarEvent,
  DateTimeOutput,
  ExecutableStepId,
  MailMessage,
  Plan,
  StepId,
} from '@smartmailr/types';
import { EXECUTABLE_STEP_IDS } from '@smartmailr/types';
import type { CalendarService } from '../collaborators.js';
import type { TriageContext } from '../pipeline-context.js';
import { TriageError } from '../errors.js';
import { createEvent } from './create-event.js';
import { extractDateTime } from './extract-datetime.js';

/** 실행 중 누적되는 스텝 출력 */
export interface MutableStepOutputs {
  extract_datetime?: DateTimeOutput;
  create_event?: CalendarEvent;
}

/** 스텝 실행 환경 -- 메시지 1건 단위 */
export interface StepEnvironment {
  readonly message: MailMessage;
  readonly context: TriageContext;
  readonly outputs: MutableStepOutputs;
  readonly calendar: CalendarService;
  readonly now: number;
  readonly signal: AbortSignal;
}

export interface StepExecutor {
  readonly id: ExecutableStepId;
  /** 같은 플랜에서 먼저 실행되어야 하는 스텝 */
  readonly requires: readonly ExecutableStepId[];
  run(env: StepEnvironment): Promise<void>;
}

export const STEP_EXECUTORS = Object.freeze<Record<ExecutableStepId, StepExecutor>>({
  extract_datetime: {
    id: 'extract_datetime',
    requires: [],
    async run(env: StepEnvironment): Promise<void> {
      const output = extractDateTime(env.message.body, { now: env.now });
      env.context.datetime = output.datetime;
      env.outputs.extract_datetime = output;
    },
  },
  create_event: {
    id: 'create_event',
    requires: ['extract_datetime'],
    async run(env: StepEnvironment): Promise<void> {
      env.outputs.create_event = await createEvent(
        env.calendar,
        env.message,
        env.context.datetime ?? null,
        env.signal,
      );
    },
  },
});

/** 실행 동작이 있는 스텝인지 (나머지는 ReplyGenerator가 소비하는 자리표시자) */
export function isExecutableStep(step: StepId): step is ExecutableStepId {
  return EXECUTABLE_STEP_IDS.some((id) => id === step);
}

/**
 * 스텝 의존 순서 검증
 *
 * create_event는 extract_datetime이 Context에 쓴 datetime을 읽으므로
 * 플랜 테이블이 확장되어도 이 순서가 깨지면 안 된다.
 */
export function assertPlanOrder(plan: Plan): void {
  const seen = new Set<StepId>();
  for (const step of plan.steps) {
    if (isExecutableStep(step)) {
      const missing = STEP_EXECUTORS[step].requires.filter((dep) => !seen.has(dep));
      if (missing.length > 0) {
        throw new TriageError(
          `Step ${step} requires ${missing.join(', ')} earlier in the ${plan.intent} plan`,
          'STEP_ORDER_VIOLATION',
          { details: { intent: plan.intent, step, missing } },
        );
      }
    }
    seen.add(step);
  }
}
