// packages/server/src/triage/observer.ts
import type { SmartMailrLogger } from '@smartmailr/infra';
import type { ActionResult, ExecutableStepId, MailMessage, TriageState } from '@smartmailr/types';
import { extractErrorInfo, isSmartMailrError } from '@smartmailr/infra';

/**
 * 트리아지 관측성 인터페이스
 *
 * 선택적(optional) DI — deps.observer? 로 주입.
 * 구현하지 않으면 관측 이벤트가 무시된다.
 */
export interface TriageObserver {
  onPipelineStart?(message: MailMessage): void;
  onStateChange?(state: TriageState, message: MailMessage): void;
  onStepComplete?(step: ExecutableStepId, output: unknown, message: MailMessage): void;
  onPipelineComplete?(message: MailMessage, result: ActionResult, durationMs: number): void;
  onPipelineError?(message: MailMessage, error: Error): void;
}

/** 기본 TriageObserver 구현 -- 상태 전이를 로거로 남긴다 */
export class DefaultTriageObserver implements TriageObserver {
  constructor(private readonly logger: SmartMailrLogger) {}

  onPipelineStart(message: MailMessage): void {
    this.logger.debug('Triage started', { messageId: message.id });
  }

  onStateChange(state: TriageState, message: MailMessage): void {
    this.logger.trace(`State → ${state}`, { messageId: message.id });
  }

  onStepComplete(step: ExecutableStepId, output: unknown, message: MailMessage): void {
    this.logger.debug(`Step ${step} completed`, { messageId: message.id, output });
  }

  onPipelineComplete(message: MailMessage, result: ActionResult, durationMs: number): void {
    this.logger.info('Triage completed', {
      messageId: message.id,
      intent: result.plan.intent,
      steps: result.plan.steps,
      sent: result.actions.sent,
      durationMs,
    });
  }

  /** 운영 에러(SmartMailrError, isOperational)는 warn, 그 외는 스택과 함께 error */
  onPipelineError(message: MailMessage, error: Error): void {
    const info = extractErrorInfo(error);
    if (isSmartMailrError(error) && error.isOperational) {
      this.logger.warn('Triage failed', {
        messageId: message.id,
        code: info.code,
        message: info.message,
        cause: info.cause,
      });
      return;
    }
    this.logger.error('Triage failed', { messageId: message.id, ...info });
  }
}
