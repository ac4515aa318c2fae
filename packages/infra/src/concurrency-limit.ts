// packages/infra/src/concurrency-limit.ts
import { SmartMailrError } from './errors.js';

export interface LimiterHandle {
  /** 슬롯 반환 (중복 호출은 무시) */
  release(): void;
}

/**
 * 동시 실행 제한기 -- 단일 풀
 *
 * - maxConcurrent 초과 시 FIFO 대기열에 삽입
 * - release 시 대기열 선두에게 슬롯을 그대로 넘긴다
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Array<(handle: LimiterHandle) => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new SmartMailrError(
        `maxConcurrent must be a positive integer: ${maxConcurrent}`,
        'INVALID_CONCURRENCY',
        { statusCode: 400, details: { maxConcurrent } },
      );
    }
  }

  async acquire(): Promise<LimiterHandle> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return this.createHandle();
    }
    return new Promise<LimiterHandle>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** fn을 슬롯 안에서 실행하고, 성공/실패와 무관하게 슬롯을 반환 */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const handle = await this.acquire();
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  getActiveCount(): number {
    return this.active;
  }

  getWaitingCount(): number {
    return this.waiters.length;
  }

  private createHandle(): LimiterHandle {
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.release();
      },
    };
  }

  // NOTE: waiter에게 slot을 넘길 때 active를 감소시키지 않는다 (slot transfer).
  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next(this.createHandle());
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }
}

/**
 * 입력 순서를 보존하며 최대 limit개씩 병렬 매핑
 *
 * fn의 reject는 그대로 전파된다. 항목 단위 격리가 필요하면 fn 안에서 처리한다.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const limiter = new ConcurrencyLimiter(limit);
  return Promise.all(items.map((item, index) => limiter.run(() => fn(item, index))));
}
