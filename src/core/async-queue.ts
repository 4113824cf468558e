/**
 * 异步队列
 * 
 * 把 WebSocket 的 'message' 事件转换为可逐条 await 的帧序列，
 * 保证同一连接上的帧严格按到达顺序、一次一条地处理。
 */

/** 队列关闭后出队时抛出 */
export class QueueClosedError extends Error {
  constructor() {
    super('队列已关闭');
    this.name = 'QueueClosedError';
  }
}

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
}

/**
 * 异步队列
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;

  /** 队列当前长度 */
  get length(): number {
    return this.queue.length;
  }

  /** 队列是否已关闭 */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * 入队一个元素
   * 如果有消费者在等待，直接交付
   */
  enqueue(item: T): void {
    if (this.closed) {
      throw new QueueClosedError();
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  /**
   * 出队一个元素
   * 如果队列为空，等待直到有新元素或队列关闭
   */
  async dequeue(): Promise<T> {
    const item = this.queue.shift();
    if (item !== undefined) {
      return item;
    }

    if (this.closed) {
      throw new QueueClosedError();
    }

    return new Promise<T>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * 尝试出队（非阻塞）
   * 返回 undefined 表示队列为空
   */
  tryDequeue(): T | undefined {
    return this.queue.shift();
  }

  /**
   * 关闭队列
   * 所有等待的消费者将收到 QueueClosedError；未消费的元素被丢弃
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(new QueueClosedError());
    }
  }

  /**
   * 异步迭代器支持，队列关闭时结束迭代
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (!this.closed) {
      try {
        yield await this.dequeue();
      } catch (err) {
        if (err instanceof QueueClosedError) break;
        throw err;
      }
    }
  }
}
