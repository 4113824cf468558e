/**
 * 实时协议处理器
 *
 * 连接状态：connecting → authenticated → (session_bound | unbound) → closed
 *
 * 握手阶段（由网关在完成 WebSocket 升级前调用）：
 *   token 无效、session_id 非法、或用户无权查看该会话 → 1008 关闭，不交换任何帧
 *
 * 稳定阶段：同一连接的 chat_message 与错误帧严格按顺序逐条处理
 *   chat_message → 持久化 → 广播 → 读取最近上下文 → 生成回复 → 持久化 → 广播
 *   ping         → 读到即回复发送者 pong，不排在进行中的回复生成之后
 *   其他 / 非法  → 仅回复发送者一条 error
 *
 * 单帧内的任何异常只产生一条通用 error 帧，循环继续；细节只写日志。
 * 无论循环如何结束，连接都只注销一次。
 */

import type { UserIdentity } from '../types/chat.js';
import type { ChatMessageFrame, FrameParseResult, InboundFrame, ServerFrame } from '../types/frame.js';
import type { ResponseGenerator } from '../types/provider.js';
import {
  FRAME_ERRORS,
  buildFrame,
  buildMessageFrame,
  encodeFrame,
  parseInboundFrame,
} from '../types/frame.js';
import type { ConnectionHandle, ConnectionRegistry } from './connection-registry.js';
import type { Authenticator } from './authenticator.js';
import type { SessionLifecycleService } from './session-service.js';
import { canView } from './access-policy.js';
import { AccessDeniedError, NotFoundError, ProtocolError, SessionStateError } from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('ProtocolHandler');

/** WebSocket 关闭码：策略违规 */
export const CLOSE_POLICY_VIOLATION = 1008;

/** 握手失败时的关闭原因 */
export const HANDSHAKE_REASONS = {
  unauthenticated: '认证失败',
  invalidSessionId: '无效的 session_id',
  forbidden: '无权访问该会话',
} as const;

/** 已认证连接的上下文 */
export interface ConnectionContext {
  user: UserIdentity;
  /** 连接时绑定的会话，null 表示未绑定 */
  sessionId: number | null;
}

/** 握手结果 */
export type HandshakeResult =
  | { ok: true; context: ConnectionContext }
  | { ok: false; code: number; reason: string };

/** 处理器依赖 */
export interface ProtocolHandlerDeps {
  registry: ConnectionRegistry;
  authenticator: Authenticator;
  sessions: SessionLifecycleService;
  responder: ResponseGenerator;
  /** 作为上下文的最近消息条数 */
  historyWindow?: number;
}

function reject(reason: string): HandshakeResult {
  return { ok: false, code: CLOSE_POLICY_VIOLATION, reason };
}

/** 解析查询参数中的 session_id；缺省为 null，非法为 undefined */
export function parseSessionIdParam(raw: string | null | undefined): number | null | undefined {
  if (raw === null || raw === undefined || raw === '') {
    return null;
  }
  if (!/^\d+$/.test(raw)) {
    return undefined;
  }
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

/**
 * 实时协议处理器
 */
export class ProtocolHandler {
  private readonly registry: ConnectionRegistry;
  private readonly authenticator: Authenticator;
  private readonly sessions: SessionLifecycleService;
  private readonly responder: ResponseGenerator;
  private readonly historyWindow: number;

  constructor(deps: ProtocolHandlerDeps) {
    this.registry = deps.registry;
    this.authenticator = deps.authenticator;
    this.sessions = deps.sessions;
    this.responder = deps.responder;
    this.historyWindow = deps.historyWindow ?? 10;
  }

  /**
   * 握手：认证用户并校验要绑定的会话
   */
  async handshake(token: string | undefined, rawSessionId: string | null | undefined): Promise<HandshakeResult> {
    const user = await this.authenticator.authenticate(token);
    if (!user) {
      return reject(HANDSHAKE_REASONS.unauthenticated);
    }

    const sessionId = parseSessionIdParam(rawSessionId);
    if (sessionId === undefined) {
      log.debug({ userId: user.id, rawSessionId }, '握手 session_id 非法');
      return reject(HANDSHAKE_REASONS.invalidSessionId);
    }

    if (sessionId !== null) {
      const access = await this.sessions.getAccess(sessionId, user.id);
      if (!access || !canView(access.participant)) {
        log.debug({ userId: user.id, sessionId }, '握手会话不可访问');
        return reject(HANDSHAKE_REASONS.forbidden);
      }
    }

    return { ok: true, context: { user, sessionId } };
  }

  /**
   * 服务一个已握手的连接，直到帧序列结束或 signal 触发
   */
  async serve(
    connection: ConnectionHandle,
    context: ConnectionContext,
    frames: AsyncIterable<string>,
    signal: AbortSignal,
  ): Promise<void> {
    const { user, sessionId } = context;

    await this.registry.register(connection, user.id, sessionId);
    log.info({ connId: connection.id, userId: user.id, sessionId }, '连接已建立');

    // 只注销一次；abort 与循环结束都等待同一次注销
    let releasing: Promise<void> | null = null;
    const release = (): Promise<void> => {
      releasing ??= this.registry.unregister(connection, user.id, sessionId).then(() => {
        log.info({ connId: connection.id, userId: user.id, sessionId }, '连接已释放');
      });
      return releasing;
    };
    const onAbort = (): void => {
      release().catch((err: unknown) => {
        log.error({ err, connId: connection.id }, '释放连接失败');
      });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    // 读取与处理分离：ping 读到即回复，其余帧排入 pending 串行处理
    let pending: Promise<void> = Promise.resolve();
    try {
      const welcome = sessionId !== null ? `已连接到会话 ${sessionId}` : '已连接到聊天服务';
      await this.reply(connection, buildFrame('system_message', welcome, sessionId));

      for await (const raw of frames) {
        if (signal.aborted) break;
        const parsed = parseInboundFrame(raw);
        if (parsed.ok && parsed.frame.type === 'ping') {
          await this.reply(connection, buildFrame('pong', 'pong', sessionId));
          continue;
        }
        pending = pending.then(() => (signal.aborted ? undefined : this.dispatch(connection, context, parsed)));
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      try {
        await pending;
      } finally {
        await release();
      }
    }
  }

  /**
   * 处理一条入站帧；不抛异常
   */
  async handleFrame(connection: ConnectionHandle, context: ConnectionContext, raw: string): Promise<void> {
    return this.dispatch(connection, context, parseInboundFrame(raw));
  }

  // ─── 内部方法 ───

  private async dispatch(connection: ConnectionHandle, context: ConnectionContext, parsed: FrameParseResult): Promise<void> {
    if (!parsed.ok) {
      log.debug({ connId: connection.id, reason: parsed.reason }, '入站帧无效');
      await this.replyError(connection, parsed.reason, context.sessionId);
      return;
    }

    const frame: InboundFrame = parsed.frame;
    try {
      switch (frame.type) {
        case 'ping':
          await this.reply(connection, buildFrame('pong', 'pong', context.sessionId));
          return;
        case 'chat_message':
          await this.handleChatMessage(connection, context, frame);
          return;
        default: {
          const unhandled: never = frame;
          throw new ProtocolError('未处理的帧类型', { frame: unhandled });
        }
      }
    } catch (err) {
      await this.replyError(connection, this.describeFailure(err, connection, context), context.sessionId);
    }
  }

  private async handleChatMessage(
    connection: ConnectionHandle,
    context: ConnectionContext,
    frame: ChatMessageFrame,
  ): Promise<void> {
    const sessionId = frame.session_id ?? context.sessionId;
    if (sessionId === null) {
      await this.replyError(connection, FRAME_ERRORS.missingSession, context.sessionId);
      return;
    }

    const stored = await this.sessions.postUserMessage(sessionId, context.user.id, frame.content);
    await this.fanOut(connection, context, sessionId, buildMessageFrame(stored));

    const history = await this.sessions.recentHistory(sessionId, this.historyWindow);
    const reply = await this.responder.generate(history, frame.content);

    const answer = await this.sessions.postAssistantMessage(sessionId, reply);
    await this.fanOut(connection, context, sessionId, buildMessageFrame(answer));

    log.debug({ sessionId, userId: context.user.id, messageId: stored.id, replyId: answer.id }, '消息已处理');
  }

  /**
   * 广播给会话的活跃成员；发送者未绑定该会话时单独回显
   */
  private async fanOut(
    connection: ConnectionHandle,
    context: ConnectionContext,
    sessionId: number,
    frame: ServerFrame,
  ): Promise<void> {
    const payload = encodeFrame(frame);
    const audience = await this.sessions.audience(sessionId);
    const report = await this.registry.broadcastToSession(sessionId, payload, audience);

    if (context.sessionId !== sessionId) {
      const echoed = await this.registry.sendToConnection(connection, payload);
      if (!echoed) {
        log.debug({ connId: connection.id, sessionId }, '回显发送者失败');
      }
    }

    log.trace({ sessionId, ...report }, '广播完成');
  }

  /** 把异常映射为下发给客户端的文案 */
  private describeFailure(err: unknown, connection: ConnectionHandle, context: ConnectionContext): string {
    if (err instanceof AccessDeniedError) {
      log.debug({ connId: connection.id, userId: context.user.id, err: err.message }, '无发言权限');
      return FRAME_ERRORS.postForbidden;
    }
    if (err instanceof NotFoundError || err instanceof SessionStateError) {
      log.debug({ connId: connection.id, userId: context.user.id, err: err.message }, '目标会话不可用');
      return FRAME_ERRORS.sessionUnavailable;
    }
    log.error({ err, connId: connection.id, userId: context.user.id }, '处理帧失败');
    return FRAME_ERRORS.internal;
  }

  private async reply(connection: ConnectionHandle, frame: ServerFrame): Promise<void> {
    const sent = await this.registry.sendToConnection(connection, encodeFrame(frame));
    if (!sent) {
      log.debug({ connId: connection.id, type: frame.type }, '回复发送失败');
    }
  }

  private async replyError(connection: ConnectionHandle, message: string, sessionId: number | null): Promise<void> {
    await this.reply(connection, buildFrame('error', message, sessionId));
  }
}
