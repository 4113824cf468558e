/**
 * 连接注册表
 *
 * 进程内唯一的共享可变状态：记录每个活跃连接属于哪个用户、绑定了哪个会话。
 * 三个索引：
 *   byUser         userId → 连接集合
 *   byUserSession  (userId, sessionId) → 连接集合
 *   bySession      sessionId → 连接集合（会话级广播）
 *
 * 索引变更与投递目标的快照都在单许可信号量内完成；写出在锁外并发进行，
 * 每次写出有超时上限，失败或超时的连接再次加锁后从全部索引中清理。
 * 慢连接不会阻塞注册、注销与其他投递。
 */

import { Semaphore } from './semaphore.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('ConnectionRegistry');

/** 传输层连接句柄 */
export interface ConnectionHandle {
  /** 进程内唯一 ID（仅用于日志） */
  readonly id: string;
  /** 底层传输是否仍可写 */
  readonly isOpen: boolean;
  /** 写出一条文本帧，失败时 reject */
  send(payload: string): Promise<void>;
  /** 关闭连接 */
  close(code: number, reason: string): void;
}

/** 一次投递的结果 */
export interface DeliveryReport {
  delivered: number;
  pruned: number;
}

/** 连接与 (user, session) 的绑定关系 */
interface Binding {
  userId: number;
  sessionId: number | null;
}

/** 注册表参数 */
export interface ConnectionRegistryOptions {
  /** 单次写出的超时（毫秒），超时视为连接失效 */
  sendTimeoutMs?: number;
}

const DEFAULT_SEND_TIMEOUT_MS = 10_000;
/** 投递失败后关闭连接使用的关闭码 */
const CLOSE_DELIVERY_FAILED = 1011;

function pairKey(userId: number, sessionId: number): string {
  return `${userId}:${sessionId}`;
}

function addTo<K>(index: Map<K, Set<ConnectionHandle>>, key: K, connection: ConnectionHandle): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(connection);
}

function removeFrom<K>(index: Map<K, Set<ConnectionHandle>>, key: K, connection: ConnectionHandle): void {
  const set = index.get(key);
  if (!set) return;
  set.delete(connection);
  if (set.size === 0) {
    index.delete(key);
  }
}

/**
 * 连接注册表
 */
export class ConnectionRegistry {
  private readonly byUser = new Map<number, Set<ConnectionHandle>>();
  private readonly byUserSession = new Map<string, Set<ConnectionHandle>>();
  private readonly bySession = new Map<number, Set<ConnectionHandle>>();
  /** 反向索引：清理失败连接时据此从全部索引中移除 */
  private readonly bindings = new Map<ConnectionHandle, Binding[]>();
  private readonly lock = new Semaphore(1, 'registry');
  private readonly sendTimeoutMs: number;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
  }

  /**
   * 注册连接；相同 (connection, user, session) 重复注册无副作用
   */
  async register(connection: ConnectionHandle, userId: number, sessionId: number | null = null): Promise<void> {
    await this.lock.use(() => {
      const bound = this.bindings.get(connection) ?? [];
      if (bound.some((b) => b.userId === userId && b.sessionId === sessionId)) {
        return;
      }
      bound.push({ userId, sessionId });
      this.bindings.set(connection, bound);

      addTo(this.byUser, userId, connection);
      if (sessionId !== null) {
        addTo(this.byUserSession, pairKey(userId, sessionId), connection);
        addTo(this.bySession, sessionId, connection);
      }
      log.debug({ connId: connection.id, userId, sessionId }, '连接已注册');
    });
  }

  /**
   * 注销连接；未注册的连接直接忽略
   */
  async unregister(connection: ConnectionHandle, userId: number, sessionId: number | null = null): Promise<void> {
    await this.lock.use(() => {
      const bound = this.bindings.get(connection);
      if (!bound) return;

      const remaining = bound.filter((b) => !(b.userId === userId && b.sessionId === sessionId));
      if (remaining.length === bound.length) return;

      this.detach(connection, { userId, sessionId }, remaining);
      log.debug({ connId: connection.id, userId, sessionId }, '连接已注销');
    });
  }

  /**
   * 向单个连接写出一帧
   *
   * 不抛异常；写出失败或超过 sendTimeoutMs 未完成时返回 false，
   * 表示连接已失效，调用方负责注销。
   */
  async sendToConnection(connection: ConnectionHandle, payload: string): Promise<boolean> {
    if (!connection.isOpen) {
      return false;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => {
        log.warn({ connId: connection.id, timeoutMs: this.sendTimeoutMs }, '写出超时');
        resolve(false);
      }, this.sendTimeoutMs);
    });
    const written = connection.send(payload).then(
      () => true,
      (err: unknown) => {
        log.debug({ err, connId: connection.id }, '写出失败');
        return false;
      },
    );

    try {
      return await Promise.race([written, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** 投递给用户的全部连接 */
  async sendToUser(userId: number, payload: string): Promise<DeliveryReport> {
    const targets = await this.lock.use(() => this.snapshot(this.byUser.get(userId)));
    return this.deliver(targets, payload);
  }

  /** 投递给 (user, session) 的全部连接 */
  async sendToSession(userId: number, sessionId: number, payload: string): Promise<DeliveryReport> {
    const targets = await this.lock.use(() => this.snapshot(this.byUserSession.get(pairKey(userId, sessionId))));
    return this.deliver(targets, payload);
  }

  /**
   * 投递给绑定到会话的全部连接
   *
   * audience 给出时，只投递给其中用户的连接（其余连接跳过但不清理）。
   */
  async broadcastToSession(
    sessionId: number,
    payload: string,
    audience?: ReadonlySet<number>,
  ): Promise<DeliveryReport> {
    const targets = await this.lock.use(() => {
      const bound = this.snapshot(this.bySession.get(sessionId));
      if (!audience) return bound;
      return bound.filter((connection) =>
        (this.bindings.get(connection) ?? []).some(
          (b) => b.sessionId === sessionId && audience.has(b.userId),
        ),
      );
    });
    return this.deliver(targets, payload);
  }

  /** 用户活跃连接数 */
  connectionCount(userId: number): number {
    return this.byUser.get(userId)?.size ?? 0;
  }

  /** (user, session) 活跃连接数 */
  sessionConnectionCount(userId: number, sessionId: number): number {
    return this.byUserSession.get(pairKey(userId, sessionId))?.size ?? 0;
  }

  /** 绑定到会话的连接数（不区分用户） */
  sessionAudienceCount(sessionId: number): number {
    return this.bySession.get(sessionId)?.size ?? 0;
  }

  /** 注册表中的连接总数 */
  get totalConnections(): number {
    return this.bindings.size;
  }

  /**
   * 关闭并遗忘全部连接（进程退出时调用）
   */
  async closeAll(code: number, reason: string): Promise<number> {
    return this.lock.use(() => {
      const connections = [...this.bindings.keys()];
      for (const connection of connections) {
        try {
          connection.close(code, reason);
        } catch (err) {
          log.warn({ err, connId: connection.id }, '关闭连接失败');
        }
      }
      this.bindings.clear();
      this.byUser.clear();
      this.byUserSession.clear();
      this.bySession.clear();
      if (connections.length > 0) {
        log.info({ count: connections.length }, '已关闭全部连接');
      }
      return connections.length;
    });
  }

  // ─── 内部方法 ───

  private snapshot(set: Set<ConnectionHandle> | undefined): ConnectionHandle[] {
    return set ? [...set] : [];
  }

  /** 在锁外写出，再加锁清理失败的连接 */
  private async deliver(targets: ConnectionHandle[], payload: string): Promise<DeliveryReport> {
    const results = await Promise.all(
      targets.map((connection) => this.sendToConnection(connection, payload)),
    );

    const failed = targets.filter((_, i) => !results[i]);
    const delivered = targets.length - failed.length;
    if (failed.length > 0) {
      await this.lock.use(() => {
        for (const connection of failed) {
          this.prune(connection);
        }
      });
      // 仍处于打开状态的（写出超时）一并关闭，客户端可重连
      for (const connection of failed.filter((c) => c.isOpen)) {
        try {
          connection.close(CLOSE_DELIVERY_FAILED, '投递失败');
        } catch (err) {
          log.warn({ err, connId: connection.id }, '关闭连接失败');
        }
      }
      log.warn({ delivered, pruned: failed.length }, '已清理失效连接');
    }
    return { delivered, pruned: failed.length };
  }

  /** 从全部索引中移除连接（调用方必须持有锁） */
  private prune(connection: ConnectionHandle): void {
    const bound = this.bindings.get(connection);
    if (!bound) return;
    for (const binding of bound) {
      this.detach(connection, binding, []);
    }
  }

  /**
   * 移除一条绑定；remaining 为连接剩余的绑定（调用方必须持有锁）
   */
  private detach(connection: ConnectionHandle, binding: Binding, remaining: Binding[]): void {
    if (remaining.length === 0) {
      this.bindings.delete(connection);
    } else {
      this.bindings.set(connection, remaining);
    }

    if (!remaining.some((b) => b.userId === binding.userId)) {
      removeFrom(this.byUser, binding.userId, connection);
    }
    if (binding.sessionId !== null) {
      removeFrom(this.byUserSession, pairKey(binding.userId, binding.sessionId), connection);
      const sessionId = binding.sessionId;
      if (!remaining.some((b) => b.sessionId === sessionId)) {
        removeFrom(this.bySession, sessionId, connection);
      }
    }
  }
}
