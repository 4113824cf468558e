/**
 * 持久化抽象层
 *
 * 定义用户、会话、参与者、消息的全部持久化操作。
 * 各存储后端实现此接口即可无缝切换。
 *
 * 设计原则：
 * - 接口方法与业务语义对齐，而非通用 CRUD
 * - 所有方法均为 async，即使底层实现是同步的（如 better-sqlite3）
 * - 需要原子性的复合操作（建会话 + owner、容量检查 + 插入、转让所有权）
 *   由实现层在单个事务内完成
 * - 上层不缓存返回的实体，超出一次帧处理即重新读取
 */

import type {
  ChatSession,
  NewMessageInput,
  NewSessionInput,
  Participant,
  ParticipantRole,
  SessionOverview,
  SessionPatch,
  StoredMessage,
  UserIdentity,
} from '../types/chat.js';

/** 创建会话（含 owner）的结果 */
export interface CreatedSession {
  session: ChatSession;
  owner: Participant;
}

/** 新增参与者的输入 */
export interface AdmitParticipantInput {
  sessionId: number;
  userId: number;
  role: ParticipantRole;
  /** 会话容量：事务内活跃人数 >= capacity 时拒绝 */
  capacity: number;
}

/** 消息分页 */
export interface MessagePage {
  skip?: number;
  limit?: number;
}

/**
 * 持久化存储提供者接口
 */
export interface StorageProvider {
  // ─── 生命周期 ───

  /** 初始化存储（建表、连接等） */
  init(): Promise<void>;

  /** 关闭存储（释放连接等） */
  close(): Promise<void>;

  // ─── Users ───

  /** 创建用户 */
  createUser(username: string): Promise<UserIdentity>;

  /** 按 ID 读取用户 */
  getUser(userId: number): Promise<UserIdentity | null>;

  /** 启用 / 停用用户 */
  setUserActive(userId: number, isActive: boolean): Promise<void>;

  // ─── Sessions ───

  /** 在一个事务内创建会话及其 owner 参与者 */
  createSessionWithOwner(ownerId: number, input: NewSessionInput): Promise<CreatedSession>;

  /** 按 ID 读取会话（包含已软删除的） */
  getSession(sessionId: number): Promise<ChatSession | null>;

  /** 更新会话字段 */
  updateSession(sessionId: number, patch: SessionPatch): Promise<ChatSession>;

  /** 用户作为活跃参与者的全部活跃会话（按 updatedAt 倒序） */
  listSessionsForUser(userId: number): Promise<SessionOverview[]>;

  /** 用户尚未加入的公开活跃会话（按 createdAt 倒序） */
  listPublicSessions(excludeUserId: number): Promise<SessionOverview[]>;

  // ─── Participants ───

  /** 读取 (session, user) 参与者记录（含 inactive） */
  getParticipant(sessionId: number, userId: number): Promise<Participant | null>;

  /** 列出会话参与者 */
  listParticipants(sessionId: number, options?: { activeOnly?: boolean }): Promise<Participant[]>;

  /** 活跃参与者数量 */
  countActiveParticipants(sessionId: number): Promise<number>;

  /**
   * 插入新参与者
   *
   * 会话已满时抛出 SessionStateError(full)；
   * (session, user) 已存在时抛出 ParticipantConflictError。
   */
  addParticipant(input: AdmitParticipantInput): Promise<Participant>;

  /**
   * 重新激活一个 inactive 参与者并设置角色
   *
   * 会话已满时抛出 SessionStateError(full)；
   * 该行已被他人抢先激活时抛出 ParticipantConflictError。
   */
  reactivateParticipant(participantId: number, role: ParticipantRole, capacity: number): Promise<Participant>;

  /** 修改参与者角色或活跃状态 */
  updateParticipant(
    participantId: number,
    patch: { role?: ParticipantRole; isActive?: boolean },
  ): Promise<Participant>;

  /** 在一个事务内把 owner 身份转给另一位活跃参与者（原 owner 降为 admin） */
  transferOwnership(sessionId: number, fromUserId: number, toUserId: number): Promise<Participant>;

  // ─── Messages ───

  /** 追加一条消息 */
  appendMessage(input: NewMessageInput): Promise<StoredMessage>;

  /** 最近的 limit 条消息（最新在前） */
  listRecentMessages(sessionId: number, limit: number): Promise<StoredMessage[]>;

  /** 按时间正序分页读取消息 */
  listMessages(sessionId: number, page?: MessagePage): Promise<StoredMessage[]>;

  /** 会话消息总数 */
  countMessages(sessionId: number): Promise<number>;
}
