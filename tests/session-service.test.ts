import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SessionLifecycleService } from '../src/core/session-service.js';
import type { SqliteStorageProvider } from '../src/storage/sqlite-provider.js';
import type { ChatSession, UserIdentity } from '../src/types/chat.js';
import {
  AccessDeniedError,
  NotFoundError,
  SessionStateError,
  ValidationError,
} from '../src/core/errors.js';
import { createMemoryStore } from './helpers.js';

describe('SessionLifecycleService', () => {
  let store: SqliteStorageProvider;
  let service: SessionLifecycleService;
  let alice: UserIdentity;
  let bob: UserIdentity;
  let carol: UserIdentity;

  beforeEach(async () => {
    store = await createMemoryStore();
    service = new SessionLifecycleService(store);
    alice = await store.createUser('alice');
    bob = await store.createUser('bob');
    carol = await store.createUser('carol');
  });

  afterEach(async () => {
    await store.close();
  });

  async function publicSession(maxParticipants = 10): Promise<ChatSession> {
    const { session } = await service.createSession(alice.id, { title: 'Lobby', kind: 'public', maxParticipants });
    return session;
  }

  describe('createSession', () => {
    it('applies defaults and trims the title', async () => {
      const { session, owner } = await service.createSession(alice.id, { title: '  Planning  ' });
      expect(session).toMatchObject({ title: 'Planning', kind: 'private', maxParticipants: 10, description: null });
      expect(owner.role).toBe('owner');
    });

    it('rejects invalid fields', async () => {
      await expect(service.createSession(alice.id, { title: '   ' })).rejects.toBeInstanceOf(ValidationError);
      await expect(service.createSession(alice.id, { title: 'x', maxParticipants: 1 }))
        .rejects.toMatchObject({ issues: ['maxParticipants: 人数上限不能小于 2'] });
    });

    it('requires an active owner', async () => {
      await store.setUserActive(alice.id, false);
      await expect(service.createSession(alice.id, { title: 'x' })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('join', () => {
    it('admits a user to a public session as member', async () => {
      const session = await publicSession();
      const participant = await service.join(session.id, bob.id);
      expect(participant).toMatchObject({ userId: bob.id, role: 'member', isActive: true });
    });

    it('refuses private sessions and repeated joins', async () => {
      const { session: privateSession } = await service.createSession(alice.id, { title: 'Private' });
      await expect(service.join(privateSession.id, bob.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'not_joinable' });

      const session = await publicSession();
      await service.join(session.id, bob.id);
      await expect(service.join(session.id, bob.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'already_participant' });
    });

    it('reuses a freed seat without duplicating rows', async () => {
      const session = await publicSession(2);
      await service.join(session.id, bob.id);
      await expect(service.join(session.id, carol.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'full' });

      await service.leave(session.id, bob.id);
      await service.join(session.id, carol.id);
      await expect(service.join(session.id, bob.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'full' });

      const rows = await store.listParticipants(session.id);
      expect(rows.map((p) => [p.userId, p.isActive])).toEqual([
        [alice.id, true],
        [bob.id, false],
        [carol.id, true],
      ]);
    });

    it('lets exactly one of two concurrent joins through', async () => {
      const session = await publicSession();
      const results = await Promise.allSettled([service.join(session.id, bob.id), service.join(session.id, bob.id)]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r) => r.status === 'rejected');
      expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(SessionStateError);
      expect(await store.countActiveParticipants(session.id)).toBe(2);
    });

    it('never exceeds capacity under concurrent joins', async () => {
      const session = await publicSession(2);
      const results = await Promise.allSettled([service.join(session.id, bob.id), service.join(session.id, carol.id)]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      expect(await store.countActiveParticipants(session.id)).toBe(2);
    });

    it('refuses deleted sessions and disabled users', async () => {
      const session = await publicSession();
      await store.setUserActive(carol.id, false);
      await expect(service.join(session.id, carol.id)).rejects.toBeInstanceOf(NotFoundError);

      await service.deleteSession(session.id, alice.id);
      await expect(service.join(session.id, bob.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'inactive' });
    });
  });

  describe('invite', () => {
    it('lets an admin invite into a private session with a chosen role', async () => {
      const { session } = await service.createSession(alice.id, { title: 'Private' });
      await service.invite(session.id, alice.id, bob.id, 'admin');

      const invited = await service.invite(session.id, bob.id, carol.id, 'viewer');
      expect(invited).toMatchObject({ userId: carol.id, role: 'viewer' });
    });

    it('refuses members, owner grants and existing participants', async () => {
      const session = await publicSession();
      await service.join(session.id, bob.id);

      await expect(service.invite(session.id, bob.id, carol.id)).rejects.toBeInstanceOf(AccessDeniedError);
      await expect(service.invite(session.id, alice.id, carol.id, 'owner')).rejects.toBeInstanceOf(AccessDeniedError);
      await expect(service.invite(session.id, alice.id, bob.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'already_participant' });
    });
  });

  describe('roles and removal', () => {
    it('protects the owner from removal, demotion and leaving', async () => {
      const session = await publicSession();
      await service.invite(session.id, alice.id, bob.id, 'admin');

      await expect(service.removeParticipant(session.id, bob.id, alice.id))
        .rejects.toThrow(new AccessDeniedError('不能移除会话创建者'));
      await expect(service.changeRole(session.id, alice.id, alice.id, 'admin'))
        .rejects.toThrow(new AccessDeniedError('不能修改会话创建者的角色'));
      await expect(service.leave(session.id, alice.id))
        .rejects.toThrow(new AccessDeniedError('会话创建者不能离开会话'));

      expect((await store.getParticipant(session.id, alice.id))?.role).toBe('owner');
    });

    it('lets an admin change roles and remove members', async () => {
      const session = await publicSession();
      await service.invite(session.id, alice.id, bob.id, 'admin');
      await service.join(session.id, carol.id);

      expect(await service.changeRole(session.id, bob.id, carol.id, 'viewer')).toMatchObject({ role: 'viewer' });
      await service.removeParticipant(session.id, bob.id, carol.id);
      expect((await store.getParticipant(session.id, carol.id))?.isActive).toBe(false);
    });

    it('transfers ownership when the owner promotes someone to owner', async () => {
      const session = await publicSession();
      await service.join(session.id, bob.id);

      const newOwner = await service.changeRole(session.id, alice.id, bob.id, 'owner');
      expect(newOwner).toMatchObject({ userId: bob.id, role: 'owner' });

      await expect(service.deleteSession(session.id, alice.id)).rejects.toBeInstanceOf(AccessDeniedError);
      await service.leave(session.id, alice.id);
      expect(await store.countActiveParticipants(session.id)).toBe(1);
    });

    it('reports leaving a session one is not in', async () => {
      const session = await publicSession();
      await expect(service.leave(session.id, bob.id))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'not_participant' });
    });
  });

  describe('settings and deletion', () => {
    it('refuses a capacity below the active member count', async () => {
      const session = await publicSession();
      await service.join(session.id, bob.id);
      await service.join(session.id, carol.id);

      await expect(service.updateSession(session.id, alice.id, { maxParticipants: 2 }))
        .rejects.toMatchObject({ name: 'SessionStateError', reason: 'capacity_below_active' });
      expect(await service.updateSession(session.id, alice.id, { maxParticipants: 3, title: ' Renamed ' }))
        .toMatchObject({ maxParticipants: 3, title: 'Renamed' });
    });

    it('rejects unknown fields and non-admin actors', async () => {
      const session = await publicSession();
      await service.join(session.id, bob.id);

      const sneaky = { title: 'Closed', isActive: false };
      await expect(service.updateSession(session.id, alice.id, sneaky)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.updateSession(session.id, bob.id, { title: 'Mine' }))
        .rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('soft-deletes on the owner request only', async () => {
      const session = await publicSession();
      await service.invite(session.id, alice.id, bob.id, 'admin');

      await expect(service.deleteSession(session.id, bob.id)).rejects.toBeInstanceOf(AccessDeniedError);
      await service.deleteSession(session.id, alice.id);

      expect((await store.getSession(session.id))?.isActive).toBe(false);
      expect(await service.getAccess(session.id, alice.id)).toBeNull();
      expect(await service.listUserSessions(alice.id)).toEqual([]);
    });
  });

  describe('queries', () => {
    it('hides sessions from non-participants', async () => {
      const { session } = await service.createSession(alice.id, { title: 'Private' });
      await expect(service.getSession(session.id, bob.id)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.getMessages(session.id, bob.id)).rejects.toBeInstanceOf(NotFoundError);
      expect((await service.getSession(session.id, alice.id)).title).toBe('Private');
    });

    it('lists only active members', async () => {
      const session = await publicSession();
      await service.join(session.id, bob.id);
      await service.join(session.id, carol.id);
      await service.leave(session.id, carol.id);

      const members = await service.listParticipants(session.id, bob.id);
      expect(members.map((p) => p.userId)).toEqual([alice.id, bob.id]);
    });

    it('pages messages and validates the page', async () => {
      const session = await publicSession();
      for (const content of ['a', 'b', 'c']) {
        await service.postUserMessage(session.id, alice.id, content);
      }

      const page = await service.getMessages(session.id, alice.id, { skip: 1, limit: 5 });
      expect(page.map((m) => m.content)).toEqual(['b', 'c']);
      await expect(service.getMessages(session.id, alice.id, { limit: 0 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('messages for the live protocol', () => {
    it('lets viewers read but not post', async () => {
      const session = await publicSession();
      await service.invite(session.id, alice.id, bob.id, 'viewer');

      await expect(service.postUserMessage(session.id, bob.id, 'hi')).rejects.toBeInstanceOf(AccessDeniedError);
      await expect(service.postUserMessage(session.id, carol.id, 'hi')).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.countMessages(session.id)).toBe(0);
    });

    it('returns recent history oldest first', async () => {
      const session = await publicSession();
      await service.postUserMessage(session.id, alice.id, 'first');
      await service.postAssistantMessage(session.id, 'second');
      await service.postUserMessage(session.id, alice.id, 'third');

      expect(await service.recentHistory(session.id, 2)).toEqual([
        { role: 'assistant', content: 'second' },
        { role: 'user', content: 'third' },
      ]);
    });

    it('computes the audience from active participants', async () => {
      const session = await publicSession();
      await service.join(session.id, bob.id);
      await service.join(session.id, carol.id);
      await service.leave(session.id, bob.id);

      expect(await service.audience(session.id)).toEqual(new Set([alice.id, carol.id]));
    });
  });
});
