import type { Timestamp, MessageId } from '@smartmailr/types';
import { createTimestamp, createMessageId } from '@smartmailr/types';
import { describe, it, expectTypeOf } from 'vitest';

describe('Brand 타입 안전성', () => {
  it('팩토리 함수가 올바른 Brand 타입을 반환한다', () => {
    expectTypeOf(createTimestamp(0)).toMatchTypeOf<Timestamp>();
    expectTypeOf(createMessageId(1)).toMatchTypeOf<MessageId>();
  });

  it('plain number는 Timestamp에 할당 불가하다', () => {
    // @ts-expect-error -- plain number는 Brand 타입에 할당 불가
    const _ts: Timestamp = 42;
  });

  it('서로 다른 Brand 타입은 호환되지 않는다', () => {
    expectTypeOf<Timestamp>().not.toMatchTypeOf<MessageId>();
    expectTypeOf<MessageId>().not.toMatchTypeOf<Timestamp>();
  });
});
