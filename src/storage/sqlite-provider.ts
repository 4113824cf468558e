/**
 * SQLite 存储提供者
 *
 * 使用 better-sqlite3（同步 API）实现 StorageProvider 接口。
 * 所有方法对外暴露为 async，保持接口一致性，方便未来切换到异步后端。
 *
 * 数据库表结构：
 *   users              - 用户
 *   chat_sessions      - 会话（软删除：is_active = 0）
 *   chat_participants  - 参与者，UNIQUE(session_id, user_id)，每个会话最多一个活跃 owner
 *   chat_messages      - 消息（追加写，按 created_at, id 排序）
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync, existsSync } from 'node:fs';
import type {
  ChatSession,
  MessageRole,
  NewMessageInput,
  NewSessionInput,
  Participant,
  ParticipantRole,
  SessionKind,
  SessionOverview,
  SessionPatch,
  StoredMessage,
  UserIdentity,
} from '../types/chat.js';
import type {
  AdmitParticipantInput,
  CreatedSession,
  MessagePage,
  StorageProvider,
} from './storage-provider.js';
import {
  NotFoundError,
  ParticipantConflictError,
  SessionStateError,
  StorageError,
} from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('SqliteStorage');

/** 会话默认容量 */
export const DEFAULT_MAX_PARTICIPANTS = 10;

/** SQLite 存储配置 */
export interface SqliteStorageConfig {
  /** 数据库文件路径，':memory:' 为内存库 */
  dbPath: string;
  /** 时钟（测试可注入） */
  now?: () => number;
}

// ─── 行类型 ───

interface UserRow {
  id: number;
  username: string;
  is_active: number;
  created_at: number;
}

interface SessionRow {
  id: number;
  title: string;
  description: string | null;
  owner_id: number;
  kind: SessionKind;
  max_participants: number;
  is_active: number;
  created_at: number;
  updated_at: number;
}

interface SessionOverviewRow extends SessionRow {
  message_count: number;
  participant_count: number;
}

interface ParticipantRow {
  id: number;
  session_id: number;
  user_id: number;
  role: ParticipantRole;
  is_active: number;
  joined_at: number;
}

interface MessageRow {
  id: number;
  session_id: number;
  user_id: number | null;
  role: MessageRole;
  content: string;
  created_at: number;
}

const SESSION_COLUMNS = 's.id, s.title, s.description, s.owner_id, s.kind, s.max_participants, s.is_active, s.created_at, s.updated_at';
const PARTICIPANT_COLUMNS = 'id, session_id, user_id, role, is_active, joined_at';
const MESSAGE_COLUMNS = 'id, session_id, user_id, role, content, created_at';

/** SQLite 唯一约束冲突 */
function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error
    && 'code' in err
    && (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');
}

function toUser(row: UserRow): UserIdentity {
  return {
    id: row.id,
    username: row.username,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
  };
}

function toSession(row: SessionRow): ChatSession {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    ownerId: row.owner_id,
    kind: row.kind,
    maxParticipants: row.max_participants,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toOverview(row: SessionOverviewRow): SessionOverview {
  return {
    ...toSession(row),
    messageCount: row.message_count,
    participantCount: row.participant_count,
  };
}

function toParticipant(row: ParticipantRow): Participant {
  return {
    id: row.id,
    sessionId: row.session_id,
    userId: row.user_id,
    role: row.role,
    isActive: row.is_active === 1,
    joinedAt: row.joined_at,
  };
}

function toMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    sessionId: row.session_id,
    authorId: row.user_id,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
  };
}

/**
 * SQLite 存储提供者
 */
export class SqliteStorageProvider implements StorageProvider {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly now: () => number;

  constructor(config: SqliteStorageConfig) {
    this.dbPath = config.dbPath;
    this.now = config.now ?? Date.now;
  }

  // ─── 生命周期 ───

  async init(): Promise<void> {
    if (this.dbPath !== ':memory:') {
      // 确保数据库目录存在
      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(this.dbPath);

    // 性能优化
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma('foreign_keys = ON');

    this.db = db;
    this.createTables();

    log.info({ dbPath: this.dbPath }, 'SQLite 存储已初始化');
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      log.info('SQLite 连接已关闭');
    }
  }

  // ─── Users ───

  async createUser(username: string): Promise<UserIdentity> {
    try {
      const result = this.conn
        .prepare<[string, number]>('INSERT INTO users (username, is_active, created_at) VALUES (?, 1, ?)')
        .run(username, this.now());
      return this.requireUser(Number(result.lastInsertRowid));
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new StorageError(`用户名已被占用: ${username}`, { username }, { cause: err });
      }
      throw err;
    }
  }

  async getUser(userId: number): Promise<UserIdentity | null> {
    const row = this.conn
      .prepare<[number], UserRow>('SELECT id, username, is_active, created_at FROM users WHERE id = ?')
      .get(userId);
    return row ? toUser(row) : null;
  }

  async setUserActive(userId: number, isActive: boolean): Promise<void> {
    const result = this.conn
      .prepare<[number, number]>('UPDATE users SET is_active = ? WHERE id = ?')
      .run(isActive ? 1 : 0, userId);
    if (result.changes === 0) {
      throw new NotFoundError('user', userId);
    }
  }

  // ─── Sessions ───

  async createSessionWithOwner(ownerId: number, input: NewSessionInput): Promise<CreatedSession> {
    const create = this.conn.transaction((owner: number, data: NewSessionInput): CreatedSession => {
      const now = this.now();
      const inserted = this.conn
        .prepare<[string, string | null, number, SessionKind, number, number, number]>(`
          INSERT INTO chat_sessions (title, description, owner_id, kind, max_participants, is_active, created_at, updated_at)
          VALUES (?, ?, ?, ?, ?, 1, ?, ?)
        `)
        .run(
          data.title,
          data.description ?? null,
          owner,
          data.kind ?? 'private',
          data.maxParticipants ?? DEFAULT_MAX_PARTICIPANTS,
          now,
          now,
        );
      const sessionId = Number(inserted.lastInsertRowid);

      const ownerRow = this.conn
        .prepare<[number, number, number]>(`
          INSERT INTO chat_participants (session_id, user_id, role, is_active, joined_at)
          VALUES (?, ?, 'owner', 1, ?)
        `)
        .run(sessionId, owner, now);

      return {
        session: this.requireSession(sessionId),
        owner: this.requireParticipantById(Number(ownerRow.lastInsertRowid)),
      };
    });

    return create(ownerId, input);
  }

  async getSession(sessionId: number): Promise<ChatSession | null> {
    const row = this.conn
      .prepare<[number], SessionRow>(`SELECT ${SESSION_COLUMNS} FROM chat_sessions s WHERE s.id = ?`)
      .get(sessionId);
    return row ? toSession(row) : null;
  }

  async updateSession(sessionId: number, patch: SessionPatch): Promise<ChatSession> {
    const current = this.requireSession(sessionId);

    this.conn
      .prepare<[string, string | null, SessionKind, number, number, number, number]>(`
        UPDATE chat_sessions
        SET title = ?, description = ?, kind = ?, max_participants = ?, is_active = ?, updated_at = ?
        WHERE id = ?
      `)
      .run(
        patch.title ?? current.title,
        patch.description !== undefined ? patch.description : current.description,
        patch.kind ?? current.kind,
        patch.maxParticipants ?? current.maxParticipants,
        (patch.isActive ?? current.isActive) ? 1 : 0,
        this.now(),
        sessionId,
      );

    return this.requireSession(sessionId);
  }

  async listSessionsForUser(userId: number): Promise<SessionOverview[]> {
    const rows = this.conn
      .prepare<[number], SessionOverviewRow>(`
        SELECT ${SESSION_COLUMNS},
          (SELECT COUNT(*) FROM chat_messages m WHERE m.session_id = s.id) AS message_count,
          (SELECT COUNT(*) FROM chat_participants p WHERE p.session_id = s.id AND p.is_active = 1) AS participant_count
        FROM chat_sessions s
        JOIN chat_participants me ON me.session_id = s.id
        WHERE me.user_id = ? AND me.is_active = 1 AND s.is_active = 1
        ORDER BY s.updated_at DESC, s.id DESC
      `)
      .all(userId);
    return rows.map(toOverview);
  }

  async listPublicSessions(excludeUserId: number): Promise<SessionOverview[]> {
    const rows = this.conn
      .prepare<[number], SessionOverviewRow>(`
        SELECT ${SESSION_COLUMNS},
          0 AS message_count,
          (SELECT COUNT(*) FROM chat_participants p WHERE p.session_id = s.id AND p.is_active = 1) AS participant_count
        FROM chat_sessions s
        WHERE s.kind = 'public' AND s.is_active = 1
          AND s.id NOT IN (
            SELECT session_id FROM chat_participants WHERE user_id = ? AND is_active = 1
          )
        ORDER BY s.created_at DESC, s.id DESC
      `)
      .all(excludeUserId);
    return rows.map(toOverview);
  }

  // ─── Participants ───

  async getParticipant(sessionId: number, userId: number): Promise<Participant | null> {
    const row = this.conn
      .prepare<[number, number], ParticipantRow>(
        `SELECT ${PARTICIPANT_COLUMNS} FROM chat_participants WHERE session_id = ? AND user_id = ?`,
      )
      .get(sessionId, userId);
    return row ? toParticipant(row) : null;
  }

  async listParticipants(sessionId: number, options: { activeOnly?: boolean } = {}): Promise<Participant[]> {
    const filter = options.activeOnly ? 'AND is_active = 1' : '';
    const rows = this.conn
      .prepare<[number], ParticipantRow>(
        `SELECT ${PARTICIPANT_COLUMNS} FROM chat_participants WHERE session_id = ? ${filter} ORDER BY joined_at ASC, id ASC`,
      )
      .all(sessionId);
    return rows.map(toParticipant);
  }

  async countActiveParticipants(sessionId: number): Promise<number> {
    return this.activeCount(sessionId);
  }

  async addParticipant(input: AdmitParticipantInput): Promise<Participant> {
    const admit = this.conn.transaction((data: AdmitParticipantInput): Participant => {
      if (this.activeCount(data.sessionId) >= data.capacity) {
        throw new SessionStateError(data.sessionId, 'full', '会话人数已满');
      }
      try {
        const result = this.conn
          .prepare<[number, number, ParticipantRole, number]>(`
            INSERT INTO chat_participants (session_id, user_id, role, is_active, joined_at)
            VALUES (?, ?, ?, 1, ?)
          `)
          .run(data.sessionId, data.userId, data.role, this.now());
        return this.requireParticipantById(Number(result.lastInsertRowid));
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new ParticipantConflictError(data.sessionId, data.userId, { cause: err });
        }
        throw err;
      }
    });

    return admit(input);
  }

  async reactivateParticipant(participantId: number, role: ParticipantRole, capacity: number): Promise<Participant> {
    const reactivate = this.conn.transaction((id: number): Participant => {
      const current = this.requireParticipantById(id);
      if (current.isActive) {
        throw new ParticipantConflictError(current.sessionId, current.userId);
      }
      if (this.activeCount(current.sessionId) >= capacity) {
        throw new SessionStateError(current.sessionId, 'full', '会话人数已满');
      }
      this.conn
        .prepare<[ParticipantRole, number, number]>(
          'UPDATE chat_participants SET is_active = 1, role = ?, joined_at = ? WHERE id = ? AND is_active = 0',
        )
        .run(role, this.now(), id);
      return this.requireParticipantById(id);
    });

    return reactivate(participantId);
  }

  async updateParticipant(
    participantId: number,
    patch: { role?: ParticipantRole; isActive?: boolean },
  ): Promise<Participant> {
    const current = this.requireParticipantById(participantId);
    this.conn
      .prepare<[ParticipantRole, number, number]>('UPDATE chat_participants SET role = ?, is_active = ? WHERE id = ?')
      .run(
        patch.role ?? current.role,
        (patch.isActive ?? current.isActive) ? 1 : 0,
        participantId,
      );
    return this.requireParticipantById(participantId);
  }

  async transferOwnership(sessionId: number, fromUserId: number, toUserId: number): Promise<Participant> {
    const transfer = this.conn.transaction((): Participant => {
      const from = this.conn
        .prepare<[number, number]>(`
          UPDATE chat_participants SET role = 'admin'
          WHERE session_id = ? AND user_id = ? AND role = 'owner' AND is_active = 1
        `)
        .run(sessionId, fromUserId);
      if (from.changes === 0) {
        throw new StorageError('转让所有权失败：原 owner 记录不存在', { sessionId, fromUserId });
      }

      const to = this.conn
        .prepare<[number, number]>(`
          UPDATE chat_participants SET role = 'owner'
          WHERE session_id = ? AND user_id = ? AND is_active = 1
        `)
        .run(sessionId, toUserId);
      if (to.changes === 0) {
        throw new SessionStateError(sessionId, 'not_participant', `用户 ${toUserId} 不是活跃参与者`);
      }

      this.conn
        .prepare<[number, number, number]>('UPDATE chat_sessions SET owner_id = ?, updated_at = ? WHERE id = ?')
        .run(toUserId, this.now(), sessionId);

      const row = this.conn
        .prepare<[number, number], ParticipantRow>(
          `SELECT ${PARTICIPANT_COLUMNS} FROM chat_participants WHERE session_id = ? AND user_id = ?`,
        )
        .get(sessionId, toUserId);
      if (!row) {
        throw new NotFoundError('participant', toUserId);
      }
      return toParticipant(row);
    });

    return transfer();
  }

  // ─── Messages ───

  async appendMessage(input: NewMessageInput): Promise<StoredMessage> {
    const result = this.conn
      .prepare<[number, number | null, MessageRole, string, number]>(`
        INSERT INTO chat_messages (session_id, user_id, role, content, created_at)
        VALUES (?, ?, ?, ?, ?)
      `)
      .run(input.sessionId, input.authorId, input.role, input.content, this.now());

    const row = this.conn
      .prepare<[number], MessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM chat_messages WHERE id = ?`)
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new StorageError('消息写入后读取失败', { sessionId: input.sessionId });
    }
    return toMessage(row);
  }

  async listRecentMessages(sessionId: number, limit: number): Promise<StoredMessage[]> {
    const rows = this.conn
      .prepare<[number, number], MessageRow>(`
        SELECT ${MESSAGE_COLUMNS} FROM chat_messages
        WHERE session_id = ?
        ORDER BY created_at DESC, id DESC
        LIMIT ?
      `)
      .all(sessionId, limit);
    return rows.map(toMessage);
  }

  async listMessages(sessionId: number, page: MessagePage = {}): Promise<StoredMessage[]> {
    const rows = this.conn
      .prepare<[number, number, number], MessageRow>(`
        SELECT ${MESSAGE_COLUMNS} FROM chat_messages
        WHERE session_id = ?
        ORDER BY created_at ASC, id ASC
        LIMIT ? OFFSET ?
      `)
      .all(sessionId, page.limit ?? 100, page.skip ?? 0);
    return rows.map(toMessage);
  }

  async countMessages(sessionId: number): Promise<number> {
    const row = this.conn
      .prepare<[number], { total: number }>('SELECT COUNT(*) AS total FROM chat_messages WHERE session_id = ?')
      .get(sessionId);
    return row?.total ?? 0;
  }

  // ─── 内部方法 ───

  /** 已初始化的连接 */
  private get conn(): Database.Database {
    if (!this.db) {
      throw new StorageError('SQLite 存储尚未初始化', { dbPath: this.dbPath });
    }
    return this.db;
  }

  private activeCount(sessionId: number): number {
    const row = this.conn
      .prepare<[number], { total: number }>(
        'SELECT COUNT(*) AS total FROM chat_participants WHERE session_id = ? AND is_active = 1',
      )
      .get(sessionId);
    return row?.total ?? 0;
  }

  private requireUser(userId: number): UserIdentity {
    const row = this.conn
      .prepare<[number], UserRow>('SELECT id, username, is_active, created_at FROM users WHERE id = ?')
      .get(userId);
    if (!row) {
      throw new NotFoundError('user', userId);
    }
    return toUser(row);
  }

  private requireSession(sessionId: number): ChatSession {
    const row = this.conn
      .prepare<[number], SessionRow>(`SELECT ${SESSION_COLUMNS} FROM chat_sessions s WHERE s.id = ?`)
      .get(sessionId);
    if (!row) {
      throw new NotFoundError('session', sessionId);
    }
    return toSession(row);
  }

  private requireParticipantById(participantId: number): Participant {
    const row = this.conn
      .prepare<[number], ParticipantRow>(`SELECT ${PARTICIPANT_COLUMNS} FROM chat_participants WHERE id = ?`)
      .get(participantId);
    if (!row) {
      throw new NotFoundError('participant', participantId);
    }
    return toParticipant(row);
  }

  /** 创建数据库表 */
  private createTables(): void {
    this.conn.exec(`
      -- 用户
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL
      );

      -- 会话
      CREATE TABLE IF NOT EXISTS chat_sessions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL,
        description TEXT,
        owner_id INTEGER NOT NULL REFERENCES users(id),
        kind TEXT NOT NULL CHECK (kind IN ('private', 'public', 'invite_only')),
        max_participants INTEGER NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      -- 参与者（离开 / 移除只置 is_active = 0）
      CREATE TABLE IF NOT EXISTS chat_participants (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id INTEGER NOT NULL REFERENCES chat_sessions(id),
        user_id INTEGER NOT NULL REFERENCES users(id),
        role TEXT NOT NULL CHECK (role IN ('owner', 'admin', 'member', 'viewer')),
        is_active INTEGER NOT NULL DEFAULT 1,
        joined_at INTEGER NOT NULL,
        UNIQUE (session_id, user_id)
      );
      -- 每个会话至多一个活跃 owner
      CREATE UNIQUE INDEX IF NOT EXISTS idx_participants_single_owner
        ON chat_participants(session_id) WHERE role = 'owner' AND is_active = 1;

      -- 消息（追加写）
      CREATE TABLE IF NOT EXISTS chat_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id INTEGER NOT NULL REFERENCES chat_sessions(id),
        user_id INTEGER REFERENCES users(id),
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system')),
        content TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_messages_session ON chat_messages(session_id, created_at, id);
    `);
  }
}
