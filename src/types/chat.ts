/**
 * 聊天领域类型定义
 *
 * 用户、会话、参与者、消息四类持久化实体。
 * 所有时间戳均为毫秒级 Unix 时间。
 */

/** 会话可见性 */
export type SessionKind = 'private' | 'public' | 'invite_only';

export const SESSION_KINDS = ['private', 'public', 'invite_only'] as const satisfies readonly SessionKind[];

/** 参与者角色 */
export type ParticipantRole = 'owner' | 'admin' | 'member' | 'viewer';

export const PARTICIPANT_ROLES = ['owner', 'admin', 'member', 'viewer'] as const satisfies readonly ParticipantRole[];

/** 消息角色 */
export type MessageRole = 'user' | 'assistant' | 'system';

export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const satisfies readonly MessageRole[];

/**
 * 用户身份
 *
 * 核心层只读取，不修改（由 CLI 维护）。
 */
export interface UserIdentity {
  id: number;
  username: string;
  isActive: boolean;
  createdAt: number;
}

/** 聊天会话 */
export interface ChatSession {
  id: number;
  title: string;
  description: string | null;
  /** 当前 owner 的用户 ID */
  ownerId: number;
  kind: SessionKind;
  /** 最大活跃参与者数（含 owner） */
  maxParticipants: number;
  /** false 表示已软删除：不再接受连接、加入与消息 */
  isActive: boolean;
  createdAt: number;
  updatedAt: number;
}

/** 会话概览（列表用） */
export interface SessionOverview extends ChatSession {
  messageCount: number;
  participantCount: number;
}

/**
 * 会话参与者
 *
 * (sessionId, userId) 唯一；离开或被移除时置为 inactive，不删除。
 */
export interface Participant {
  id: number;
  sessionId: number;
  userId: number;
  role: ParticipantRole;
  isActive: boolean;
  joinedAt: number;
}

/** 已持久化的消息（不可变，按 createdAt, id 排序） */
export interface StoredMessage {
  id: number;
  sessionId: number;
  /** 系统 / 助手消息为 null */
  authorId: number | null;
  role: MessageRole;
  content: string;
  createdAt: number;
}

/** 交给回复生成器的一轮对话 */
export interface ConversationTurn {
  role: MessageRole;
  content: string;
}

/** 创建会话的输入 */
export interface NewSessionInput {
  title: string;
  description?: string | null;
  kind?: SessionKind;
  maxParticipants?: number;
}

/** 会话可修改字段 */
export interface SessionPatch {
  title?: string;
  description?: string | null;
  kind?: SessionKind;
  maxParticipants?: number;
  isActive?: boolean;
}

/** 追加消息的输入 */
export interface NewMessageInput {
  sessionId: number;
  authorId: number | null;
  role: MessageRole;
  content: string;
}
