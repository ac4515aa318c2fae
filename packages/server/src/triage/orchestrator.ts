// packages/server/src/triage/orchestrator.ts
import type { SmartMailrLogger } from '@smartmailr/infra';
import type {
  ActionResult,
  BatchEntry,
  MailMessage,
  TriageState,
} from '@smartmailr/types';
import { mapWithConcurrency, runWithContext, toError } from '@smartmailr/infra';
import type { CalendarService, MailTransport } from './collaborators.js';
import type { TriageObserver } from './observer.js';
import { TriageError } from './errors.js';
import { classifyIntent } from './intent-classifier.js';
import { createTriageContext } from './pipeline-context.js';
import { planForIntent } from './planner.js';
import { finalizeReply } from './quality-assurance.js';
import { generateReply, type Signature } from './reply-generator.js';
import {
  STEP_EXECUTORS,
  assertPlanOrder,
  isExecutableStep,
  type MutableStepOutputs,
} from './steps/registry.js';

/** 트리아지 설정 */
export interface TriageOptions {
  readonly signature: Signature;
  /** 메시지 1건 처리 타임아웃 */
  readonly timeoutMs: number;
  /** processBatch 동시 처리 수 */
  readonly maxConcurrent: number;
}

/** 트리아지 의존성 주입 */
export interface TriageDependencies {
  readonly calendar: CalendarService;
  /** 없으면 전송은 mock 처리되어 sent = true */
  readonly mailTransport?: MailTransport;
  readonly logger: SmartMailrLogger;
  readonly observer?: TriageObserver;
  /** 기준 시각 (테스트 결정성) */
  readonly clock?: () => number;
}

/** 답장 제목 -- 이미 Re:로 시작하면 그대로 */
export function replySubject(subject: string): string {
  return /^re:/i.test(subject.trim()) ? subject : `Re: ${subject}`;
}

/**
 * 트리아지 오케스트레이터
 *
 * 상태 전이 (메시지 1건, 역방향 없음):
 * received
 *   -> classified      (IntentClassifier)
 *   -> planned         (Planner + 스텝 순서 검증)
 *   -> steps-executed  (실행 스텝만 순차 실행, 자리표시자는 건너뜀)
 *   -> reply-drafted   (ReplyGenerator)
 *   -> qa-finalized    (QualityAssurance)
 *   -> completed       (전송 + ActionResult 동결)
 */
export class TriageOrchestrator {
  private readonly clock: () => number;

  constructor(
    private readonly options: TriageOptions,
    private readonly deps: TriageDependencies,
  ) {
    this.clock = deps.clock ?? Date.now;
  }

  /** 단일 진입점: MailMessage -> ActionResult */
  async process(message: MailMessage, signal?: AbortSignal): Promise<ActionResult> {
    return runWithContext(
      { requestId: `msg-${message.id}`, messageId: message.id, startedAt: this.clock() },
      () => this.run(message, signal),
    );
  }

  /**
   * 배치 처리 -- 입력 순서대로 결과를 돌려준다.
   *
   * 메시지 간 공유 상태가 없으므로 병렬 처리하고, 한 건의 실패는 해당 엔트리에만 남는다.
   */
  async processBatch(
    messages: readonly MailMessage[],
    signal?: AbortSignal,
  ): Promise<BatchEntry[]> {
    return mapWithConcurrency(
      messages,
      this.options.maxConcurrent,
      async (message): Promise<BatchEntry> => {
        try {
          return { messageId: message.id, ok: true, result: await this.process(message, signal) };
        } catch (error) {
          return { messageId: message.id, ok: false, error: toError(error) };
        }
      },
    );
  }

  private async run(message: MailMessage, outerSignal?: AbortSignal): Promise<ActionResult> {
    const startTime = performance.now();
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const signal = outerSignal ? AbortSignal.any([outerSignal, timeout]) : timeout;
    const { signature } = this.options;

    this.deps.observer?.onPipelineStart?.(message);

    try {
      this.throwIfAborted(signal, message, 'received');
      const intent = classifyIntent(message.subject, message.body);
      this.transition('classified', message);

      const plan = planForIntent(intent);
      assertPlanOrder(plan);
      this.transition('planned', message);

      const context = createTriageContext();
      const outputs: MutableStepOutputs = {};
      const now = this.clock();
      for (const step of plan.steps) {
        if (!isExecutableStep(step)) {
          continue;
        }
        this.throwIfAborted(signal, message, step);
        await STEP_EXECUTORS[step].run({
          message,
          context,
          outputs,
          calendar: this.deps.calendar,
          now,
          signal,
        });
        this.deps.observer?.onStepComplete?.(step, outputs[step], message);
      }
      this.transition('steps-executed', message);

      const draft = generateReply(intent, message, context, signature);
      this.transition('reply-drafted', message);

      const reply = finalizeReply(draft, signature);
      this.transition('qa-finalized', message);

      this.throwIfAborted(signal, message, 'deliver');
      const sent = await this.deliver(message, reply, signal);

      const result = freezeResult({ plan, actions: { ...outputs, reply, sent } });
      this.transition('completed', message);
      this.deps.observer?.onPipelineComplete?.(message, result, performance.now() - startTime);
      return result;
    } catch (error) {
      this.deps.observer?.onPipelineError?.(message, toError(error));
      throw error;
    }
  }

  private async deliver(message: MailMessage, reply: string, signal: AbortSignal): Promise<boolean> {
    const transport = this.deps.mailTransport;
    if (!transport) {
      return true;
    }

    let delivered: boolean;
    try {
      const ack = await transport.send(
        { to: message.sender, subject: replySubject(message.subject), body: reply },
        signal,
      );
      delivered = ack.delivered;
    } catch (error) {
      throw new TriageError(`Reply delivery failed for message ${message.id}`, 'DELIVERY_FAILED', {
        statusCode: 502,
        cause: toError(error),
        details: { messageId: message.id },
      });
    }

    if (!delivered) {
      throw new TriageError(
        `Mail transport rejected reply for message ${message.id}`,
        'DELIVERY_FAILED',
        { statusCode: 502, details: { messageId: message.id } },
      );
    }
    return true;
  }

  private transition(state: TriageState, message: MailMessage): void {
    this.deps.observer?.onStateChange?.(state, message);
  }

  private throwIfAborted(signal: AbortSignal, message: MailMessage, stage: string): void {
    if (!signal.aborted) {
      return;
    }
    this.deps.logger.warn('Triage aborted', { messageId: message.id, stage });
    throw new TriageError(`Triage aborted at ${stage} for message ${message.id}`, 'ABORTED', {
      statusCode: 499,
      cause: signal.reason instanceof Error ? signal.reason : undefined,
      details: { messageId: message.id, stage },
    });
  }
}

/** ActionResult는 생성 후 불변 */
function freezeResult(result: ActionResult): ActionResult {
  Object.freeze(result.plan);
  Object.freeze(result.actions.extract_datetime);
  Object.freeze(result.actions.create_event);
  Object.freeze(result.actions);
  return Object.freeze(result);
}
