/**
 * 会话生命周期服务
 *
 * 负责会话的创建、加入、邀请、角色变更、移除、离开、删除与查询，
 * 以及实时协议所需的发言持久化与上下文读取。
 *
 * 所有拒绝都以带类型的错误抛出：
 *   NotFoundError       会话 / 用户不存在，或对当前用户不可见
 *   SessionStateError   会话已删除、不可加入、已满、重复加入
 *   AccessDeniedError   角色不允许该操作
 *   ValidationError     输入字段非法
 */

import { z } from 'zod';
import type {
  ChatSession,
  ConversationTurn,
  NewSessionInput,
  Participant,
  ParticipantRole,
  SessionOverview,
  StoredMessage,
  UserIdentity,
} from '../types/chat.js';
import { PARTICIPANT_ROLES, SESSION_KINDS } from '../types/chat.js';
import type { CreatedSession, MessagePage, StorageProvider } from '../storage/storage-provider.js';
import {
  canAdminister,
  canPost,
  canView,
  checkLeave,
  checkRemoval,
  checkRoleChange,
  isOwner,
} from './access-policy.js';
import {
  AccessDeniedError,
  NotFoundError,
  ParticipantConflictError,
  SessionStateError,
  ValidationError,
} from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('SessionService');

const TitleSchema = z.string().trim().min(1, '标题不能为空').max(200, '标题不能超过 200 个字符');
const DescriptionSchema = z.string().max(1000, '描述不能超过 1000 个字符').nullable();
const CapacitySchema = z
  .number()
  .int('人数上限必须为整数')
  .min(2, '人数上限不能小于 2')
  .max(100, '人数上限不能大于 100');

const NewSessionSchema = z.object({
  title: TitleSchema,
  description: DescriptionSchema.default(null),
  kind: z.enum(SESSION_KINDS).default('private'),
  maxParticipants: CapacitySchema.default(10),
});

const SessionPatchSchema = z
  .object({
    title: TitleSchema,
    description: DescriptionSchema,
    kind: z.enum(SESSION_KINDS),
    maxParticipants: CapacitySchema,
  })
  .partial()
  .strict();

const RoleSchema = z.enum(PARTICIPANT_ROLES);

const MessagePageSchema = z.object({
  skip: z.number().int().min(0).default(0),
  limit: z.number().int().min(1).max(100).default(50),
});

/** 会话可由成员修改的字段 */
export type SessionSettingsPatch = z.input<typeof SessionPatchSchema>;

/** 用户对会话的访问情况 */
export interface SessionAccess {
  session: ChatSession;
  participant: Participant | null;
}

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ValidationError(`${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * 会话生命周期服务
 */
export class SessionLifecycleService {
  constructor(private readonly store: StorageProvider) {}

  // ─── 生命周期 ───

  /** 创建会话，创建者成为唯一 owner */
  async createSession(ownerId: number, input: NewSessionInput): Promise<CreatedSession> {
    await this.requireActiveUser(ownerId);
    const data = parseInput(NewSessionSchema, input, '会话参数无效');
    const created = await this.store.createSessionWithOwner(ownerId, data);
    log.info({ sessionId: created.session.id, ownerId, kind: created.session.kind }, '会话已创建');
    return created;
  }

  /**
   * 加入公开会话
   *
   * 已离开的成员原地恢复为 member；并发插入冲突视为已加入。
   */
  async join(sessionId: number, userId: number): Promise<Participant> {
    const session = await this.requireActiveSession(sessionId);
    await this.requireActiveUser(userId);

    const existing = await this.store.getParticipant(sessionId, userId);
    if (existing?.isActive) {
      throw new SessionStateError(sessionId, 'already_participant', `用户 ${userId} 已在会话中`);
    }
    if (session.kind !== 'public') {
      throw new SessionStateError(sessionId, 'not_joinable', '只能直接加入公开会话');
    }

    const participant = await this.admit(session, userId, 'member', existing);
    log.info({ sessionId, userId }, '用户已加入会话');
    return participant;
  }

  /**
   * 邀请用户加入会话（owner / admin）
   */
  async invite(
    sessionId: number,
    actorId: number,
    targetUserId: number,
    role: ParticipantRole = 'member',
  ): Promise<Participant> {
    const grantedRole = parseInput(RoleSchema, role, '角色无效');
    const session = await this.requireActiveSession(sessionId);

    const actor = await this.store.getParticipant(sessionId, actorId);
    if (!canAdminister(actor)) {
      throw new AccessDeniedError('需要管理员权限才能邀请成员', { sessionId, actorId });
    }
    if (grantedRole === 'owner') {
      throw new AccessDeniedError('不能通过邀请授予 owner 角色', { sessionId, actorId, targetUserId });
    }
    await this.requireActiveUser(targetUserId);

    const existing = await this.store.getParticipant(sessionId, targetUserId);
    if (existing?.isActive) {
      throw new SessionStateError(sessionId, 'already_participant', `用户 ${targetUserId} 已在会话中`);
    }

    const participant = await this.admit(session, targetUserId, grantedRole, existing);
    log.info({ sessionId, actorId, targetUserId, role: grantedRole }, '用户已被邀请');
    return participant;
  }

  /**
   * 修改成员角色
   *
   * 把他人提升为 owner 即转让所有权：原 owner 降为 admin。
   */
  async changeRole(
    sessionId: number,
    actorId: number,
    targetUserId: number,
    role: ParticipantRole,
  ): Promise<Participant> {
    const newRole = parseInput(RoleSchema, role, '角色无效');
    await this.requireActiveSession(sessionId);

    const actor = await this.store.getParticipant(sessionId, actorId);
    const target = await this.store.getParticipant(sessionId, targetUserId);
    const decision = checkRoleChange(actor, target, newRole);
    if (!decision.allowed) {
      throw new AccessDeniedError(decision.reason, { sessionId, actorId, targetUserId, role: newRole });
    }
    if (!target) {
      throw new NotFoundError('participant', targetUserId);
    }

    if (newRole === 'owner') {
      const owner = await this.store.transferOwnership(sessionId, actorId, targetUserId);
      log.info({ sessionId, from: actorId, to: targetUserId }, '会话所有权已转让');
      return owner;
    }

    const updated = await this.store.updateParticipant(target.id, { role: newRole });
    log.info({ sessionId, actorId, targetUserId, role: newRole }, '成员角色已变更');
    return updated;
  }

  /** 移除成员（owner / admin），owner 不可被移除 */
  async removeParticipant(sessionId: number, actorId: number, targetUserId: number): Promise<void> {
    await this.requireActiveSession(sessionId);

    const actor = await this.store.getParticipant(sessionId, actorId);
    const target = await this.store.getParticipant(sessionId, targetUserId);
    const decision = checkRemoval(actor, target);
    if (!decision.allowed) {
      throw new AccessDeniedError(decision.reason, { sessionId, actorId, targetUserId });
    }
    if (!target) {
      throw new NotFoundError('participant', targetUserId);
    }

    await this.store.updateParticipant(target.id, { isActive: false });
    log.info({ sessionId, actorId, targetUserId }, '成员已被移除');
  }

  /** 主动离开会话，owner 不能离开 */
  async leave(sessionId: number, userId: number): Promise<void> {
    await this.requireSession(sessionId);

    const participant = await this.store.getParticipant(sessionId, userId);
    if (!participant?.isActive) {
      throw new SessionStateError(sessionId, 'not_participant', `用户 ${userId} 不在会话中`);
    }
    const decision = checkLeave(participant);
    if (!decision.allowed) {
      throw new AccessDeniedError(decision.reason, { sessionId, userId });
    }

    await this.store.updateParticipant(participant.id, { isActive: false });
    log.info({ sessionId, userId }, '用户已离开会话');
  }

  /** 删除会话（仅 owner，软删除） */
  async deleteSession(sessionId: number, actorId: number): Promise<void> {
    await this.requireActiveSession(sessionId);

    const actor = await this.store.getParticipant(sessionId, actorId);
    if (!isOwner(actor)) {
      throw new AccessDeniedError('只有会话创建者可以删除会话', { sessionId, actorId });
    }

    await this.store.updateSession(sessionId, { isActive: false });
    log.info({ sessionId, actorId }, '会话已删除');
  }

  /** 修改会话设置（owner / admin） */
  async updateSession(sessionId: number, actorId: number, patch: SessionSettingsPatch): Promise<ChatSession> {
    const data = parseInput(SessionPatchSchema, patch, '会话参数无效');
    await this.requireActiveSession(sessionId);

    const actor = await this.store.getParticipant(sessionId, actorId);
    if (!canAdminister(actor)) {
      throw new AccessDeniedError('需要管理员权限才能修改会话', { sessionId, actorId });
    }

    if (data.maxParticipants !== undefined) {
      const active = await this.store.countActiveParticipants(sessionId);
      if (data.maxParticipants < active) {
        throw new SessionStateError(
          sessionId,
          'capacity_below_active',
          `人数上限 ${data.maxParticipants} 小于当前成员数 ${active}`,
        );
      }
    }

    const updated = await this.store.updateSession(sessionId, data);
    log.info({ sessionId, actorId, fields: Object.keys(data) }, '会话设置已更新');
    return updated;
  }

  // ─── 查询 ───

  /** 读取会话（需要查看权限） */
  async getSession(sessionId: number, userId: number): Promise<ChatSession> {
    const access = await this.requireViewer(sessionId, userId);
    return access.session;
  }

  /** 用户参与的全部活跃会话 */
  async listUserSessions(userId: number): Promise<SessionOverview[]> {
    return this.store.listSessionsForUser(userId);
  }

  /** 用户尚未加入的公开会话 */
  async listPublicSessions(userId: number): Promise<SessionOverview[]> {
    return this.store.listPublicSessions(userId);
  }

  /** 会话活跃成员（需要查看权限） */
  async listParticipants(sessionId: number, userId: number): Promise<Participant[]> {
    await this.requireViewer(sessionId, userId);
    return this.store.listParticipants(sessionId, { activeOnly: true });
  }

  /** 分页读取消息，时间正序（需要查看权限） */
  async getMessages(sessionId: number, userId: number, page: MessagePage = {}): Promise<StoredMessage[]> {
    const range = parseInput(MessagePageSchema, page, '分页参数无效');
    await this.requireViewer(sessionId, userId);
    return this.store.listMessages(sessionId, range);
  }

  // ─── 实时协议 ───

  /**
   * 读取用户对活跃会话的访问情况
   *
   * 会话不存在或已删除时返回 null。
   */
  async getAccess(sessionId: number, userId: number): Promise<SessionAccess | null> {
    const session = await this.store.getSession(sessionId);
    if (!session?.isActive) {
      return null;
    }
    const participant = await this.store.getParticipant(sessionId, userId);
    return { session, participant };
  }

  /** 持久化用户发言（需要发言权限） */
  async postUserMessage(sessionId: number, userId: number, content: string): Promise<StoredMessage> {
    const access = await this.getAccess(sessionId, userId);
    if (!access || !canView(access.participant)) {
      throw new NotFoundError('session', sessionId);
    }
    if (!canPost(access.participant)) {
      throw new AccessDeniedError('当前角色无发言权限', { sessionId, userId });
    }
    return this.store.appendMessage({ sessionId, authorId: userId, role: 'user', content });
  }

  /** 持久化助手回复 */
  async postAssistantMessage(sessionId: number, content: string): Promise<StoredMessage> {
    return this.store.appendMessage({ sessionId, authorId: null, role: 'assistant', content });
  }

  /** 最近 limit 条消息，时间正序 */
  async recentHistory(sessionId: number, limit: number): Promise<ConversationTurn[]> {
    const recent = await this.store.listRecentMessages(sessionId, limit);
    return recent.reverse().map((message) => ({ role: message.role, content: message.content }));
  }

  /** 当前活跃成员的用户 ID 集合（广播受众） */
  async audience(sessionId: number): Promise<Set<number>> {
    const participants = await this.store.listParticipants(sessionId, { activeOnly: true });
    return new Set(participants.map((p) => p.userId));
  }

  // ─── 内部方法 ───

  /**
   * 插入或恢复参与者；唯一约束冲突时重新读取，已活跃则按重复加入处理
   */
  private async admit(
    session: ChatSession,
    userId: number,
    role: ParticipantRole,
    existing: Participant | null,
  ): Promise<Participant> {
    try {
      if (existing) {
        return await this.store.reactivateParticipant(existing.id, role, session.maxParticipants);
      }
      return await this.store.addParticipant({
        sessionId: session.id,
        userId,
        role,
        capacity: session.maxParticipants,
      });
    } catch (err) {
      if (!(err instanceof ParticipantConflictError)) {
        throw err;
      }
      const current = await this.store.getParticipant(session.id, userId);
      log.debug({ sessionId: session.id, userId, active: current?.isActive }, '参与者并发写入冲突');
      if (current?.isActive) {
        throw new SessionStateError(session.id, 'already_participant', `用户 ${userId} 已在会话中`);
      }
      throw err;
    }
  }

  private async requireSession(sessionId: number): Promise<ChatSession> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      throw new NotFoundError('session', sessionId);
    }
    return session;
  }

  private async requireActiveSession(sessionId: number): Promise<ChatSession> {
    const session = await this.requireSession(sessionId);
    if (!session.isActive) {
      throw new SessionStateError(sessionId, 'inactive', '会话已删除');
    }
    return session;
  }

  private async requireActiveUser(userId: number): Promise<UserIdentity> {
    const user = await this.store.getUser(userId);
    if (!user?.isActive) {
      throw new NotFoundError('user', userId);
    }
    return user;
  }

  /** 不可见的会话一律按不存在处理 */
  private async requireViewer(sessionId: number, userId: number): Promise<SessionAccess> {
    const access = await this.getAccess(sessionId, userId);
    if (!access || !canView(access.participant)) {
      throw new NotFoundError('session', sessionId);
    }
    return access;
  }
}
