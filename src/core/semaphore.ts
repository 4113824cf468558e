/**
 * 计数信号量
 *
 * maxPermits = 1 时即为互斥锁（ConnectionRegistry 的临界区）；
 * 大于 1 时用于限制回复生成的并发数。
 * 释放时许可直接移交给队首等待者（FIFO），不会被新来的 acquire 插队。
 */

import { createChildLogger } from './logger.js';

const log = createChildLogger('Semaphore');

export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(
    private readonly maxPermits: number,
    private readonly label = 'semaphore',
  ) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new Error(`[${label}] maxPermits 必须为正整数，收到: ${maxPermits}`);
    }
    this.permits = maxPermits;
  }

  /**
   * 获取一个许可；无可用许可时排队等待
   *
   * signal 触发时退出队列并以其 reason 拒绝，不占用许可。
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    log.trace({ label: this.label, waiting: this.waiters.length + 1 }, '等待许可');
    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * 释放一个许可
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.permits >= this.maxPermits) {
      throw new Error(`[${this.label}] release 次数多于 acquire`);
    }
    this.permits++;
  }

  /**
   * 持有许可执行 fn，无论成功或抛错都会释放
   */
  async use<T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /** 当前可用许可数 */
  get available(): number {
    return this.permits;
  }

  /** 当前等待者数量 */
  get waiting(): number {
    return this.waiters.length;
  }
}
