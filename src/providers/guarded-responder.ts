/**
 * 受保护的回复生成器
 *
 * 包装任意生成器，限制每次调用的耗时与同时进行的调用数。
 * 超时、抛错或返回空文本时一律回退为致歉文案，不向上抛出。
 */

import type { ConversationTurn } from '../types/chat.js';
import type { ResponseGenerator } from '../types/provider.js';
import { ResponderError } from '../core/errors.js';
import { Semaphore } from '../core/semaphore.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('GuardedResponder');

/** 生成失败时发送的文案 */
export const FALLBACK_REPLY = '抱歉，我暂时无法处理你的请求，请稍后再试。';

/** 保护参数 */
export interface GuardOptions {
  timeoutMs: number;
  maxConcurrent: number;
}

/** signal 触发时以其 reason 拒绝，不等待 work 完成 */
function abortable<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason instanceof Error ? signal.reason : new Error('已取消'));
    };
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

/**
 * 受保护的回复生成器
 */
export class GuardedResponder implements ResponseGenerator {
  readonly name: string;
  private readonly semaphore: Semaphore;
  private readonly timeoutMs: number;

  constructor(
    private readonly inner: ResponseGenerator,
    options: GuardOptions,
  ) {
    this.name = `guarded(${inner.name})`;
    this.semaphore = new Semaphore(options.maxConcurrent, `responder:${inner.name}`);
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * 超时从调用开始计时，排队等待并发名额的时间也计算在内
   */
  async generate(history: ConversationTurn[], message: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const forward = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forward, { once: true });
    if (signal?.aborted) {
      forward();
    }
    const timer = setTimeout(() => {
      controller.abort(new ResponderError(this.inner.name, `生成超时 (${this.timeoutMs}ms)`));
    }, this.timeoutMs);

    try {
      const reply = await this.semaphore.use(
        () => abortable(this.inner.generate(history, message, controller.signal), controller.signal),
        controller.signal,
      );
      const text = reply.trim();
      if (!text) {
        log.warn({ responder: this.inner.name }, '生成结果为空，使用兜底文案');
        return FALLBACK_REPLY;
      }
      return text;
    } catch (err) {
      log.warn({ err, responder: this.inner.name }, '生成回复失败，使用兜底文案');
      return FALLBACK_REPLY;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    }
  }
}
