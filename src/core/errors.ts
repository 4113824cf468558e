/**
 * 错误类型定义
 * 
 * 所有自定义错误都继承自 HuddleError 基类。
 * 错误信息必须包含关键上下文参数；context 只写日志，不下发给客户端。
 */

/** 基础错误类 */
export class HuddleError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'HuddleError';
  }
}

/** 配置错误 */
export class ConfigError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', context, options);
    this.name = 'ConfigError';
  }
}

/** 实体不存在（或对当前用户不可见） */
export class NotFoundError extends HuddleError {
  constructor(
    public readonly entity: 'user' | 'session' | 'participant',
    public readonly entityId: number,
  ) {
    super(`${entity} 不存在: ${entityId}`, 'NOT_FOUND', { entity, entityId });
    this.name = 'NotFoundError';
  }
}

/** 权限不足 */
export class AccessDeniedError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ACCESS_DENIED', context);
    this.name = 'AccessDeniedError';
  }
}

/** 会话状态不允许该操作的具体原因 */
export type SessionStateReason =
  | 'inactive'
  | 'not_joinable'
  | 'full'
  | 'already_participant'
  | 'not_participant'
  | 'capacity_below_active';

/** 会话状态错误 */
export class SessionStateError extends HuddleError {
  constructor(
    public readonly sessionId: number,
    public readonly reason: SessionStateReason,
    message: string,
  ) {
    super(`[Session: ${sessionId}] ${message}`, 'SESSION_STATE_ERROR', { sessionId, reason });
    this.name = 'SessionStateError';
  }
}

/**
 * 参与者唯一约束冲突
 *
 * 并发 join / invite 竞争插入同一 (session, user) 时由存储层抛出，
 * 上层应重新读取已存在的行，而不是当作故障处理。
 */
export class ParticipantConflictError extends HuddleError {
  constructor(sessionId: number, userId: number, options?: ErrorOptions) {
    super(
      `参与者记录已存在: session=${sessionId}, user=${userId}`,
      'PARTICIPANT_CONFLICT',
      { sessionId, userId },
      options,
    );
    this.name = 'ParticipantConflictError';
  }
}

/** 存储层错误 */
export class StorageError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, 'STORAGE_ERROR', context, options);
    this.name = 'StorageError';
  }
}

/** 回复生成器错误 */
export class ResponderError extends HuddleError {
  constructor(
    responderName: string,
    message: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(
      `[${responderName}] ${message}`,
      'RESPONDER_ERROR',
      { responderName, ...context },
      options,
    );
    this.name = 'ResponderError';
  }
}

/** 通道错误 */
export class ChannelError extends HuddleError {
  constructor(
    channelName: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      `[Channel: ${channelName}] ${message}`,
      'CHANNEL_ERROR',
      { channelName },
      options,
    );
    this.name = 'ChannelError';
  }
}

/** 认证失败（握手阶段，映射为 1008 关闭） */
export class AuthError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, 'AUTH_ERROR', context, options);
    this.name = 'AuthError';
  }
}

/** 协议错误（握手参数非法等） */
export class ProtocolError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROTOCOL_ERROR', context);
    this.name = 'ProtocolError';
  }
}

/** 输入校验失败 */
export class ValidationError extends HuddleError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', { issues });
    this.name = 'ValidationError';
  }
}
