import type { MessageId, Timestamp } from './common.js';

/**
 * 수신 메일 -- 파이프라인의 읽기 전용 입력
 *
 * 생성 이후 변경되지 않는다. 필드 누락은 파이프라인 진입 전에 거부된다.
 */
export interface MailMessage {
  readonly id: MessageId;
  /** 발신자 주소 (반드시 '@' 포함) */
  readonly sender: string;
  readonly subject: string;
  readonly body: string;
  readonly receivedAt: Timestamp;
}

/** 아웃바운드 회신 -- 메일 트랜스포트로 전달되는 형태 */
export interface OutboundReply {
  readonly to: string;
  readonly subject: string;
  readonly body: string;
}
