import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SqliteStorageProvider } from '../src/storage/sqlite-provider.js';
import {
  ParticipantConflictError,
  SessionStateError,
  StorageError,
} from '../src/core/errors.js';
import { createMemoryStore } from './helpers.js';

describe('SqliteStorageProvider', () => {
  let store: SqliteStorageProvider;

  beforeEach(async () => {
    store = await createMemoryStore();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('users', () => {
    it('creates and reads users', async () => {
      const alice = await store.createUser('alice');
      expect(alice).toMatchObject({ username: 'alice', isActive: true });
      expect(await store.getUser(alice.id)).toEqual(alice);
      expect(await store.getUser(999)).toBeNull();
    });

    it('rejects a duplicate username', async () => {
      await store.createUser('alice');
      await expect(store.createUser('alice')).rejects.toBeInstanceOf(StorageError);
    });

    it('toggles the active flag', async () => {
      const alice = await store.createUser('alice');
      await store.setUserActive(alice.id, false);
      expect((await store.getUser(alice.id))?.isActive).toBe(false);
    });
  });

  describe('sessions and participants', () => {
    it('creates the session and its owner together', async () => {
      const alice = await store.createUser('alice');
      const { session, owner } = await store.createSessionWithOwner(alice.id, { title: 'Room' });

      expect(session).toMatchObject({
        title: 'Room',
        description: null,
        ownerId: alice.id,
        kind: 'private',
        maxParticipants: 10,
        isActive: true,
      });
      expect(owner).toMatchObject({ sessionId: session.id, userId: alice.id, role: 'owner', isActive: true });
      expect(await store.countActiveParticipants(session.id)).toBe(1);
    });

    it('enforces capacity and uniqueness when admitting participants', async () => {
      const alice = await store.createUser('alice');
      const bob = await store.createUser('bob');
      const carol = await store.createUser('carol');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Pair', maxParticipants: 2 });

      await store.addParticipant({ sessionId: session.id, userId: bob.id, role: 'member', capacity: 2 });

      const full = store.addParticipant({ sessionId: session.id, userId: carol.id, role: 'member', capacity: 2 });
      await expect(full).rejects.toMatchObject({ name: 'SessionStateError', reason: 'full' });

      const duplicate = store.addParticipant({ sessionId: session.id, userId: bob.id, role: 'member', capacity: 5 });
      await expect(duplicate).rejects.toBeInstanceOf(ParticipantConflictError);
    });

    it('reactivates a departed participant in place', async () => {
      const alice = await store.createUser('alice');
      const bob = await store.createUser('bob');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Room' });
      const joined = await store.addParticipant({ sessionId: session.id, userId: bob.id, role: 'viewer', capacity: 10 });
      await store.updateParticipant(joined.id, { isActive: false });

      const back = await store.reactivateParticipant(joined.id, 'member', 10);

      expect(back).toMatchObject({ id: joined.id, role: 'member', isActive: true });
      expect(await store.listParticipants(session.id)).toHaveLength(2);
      await expect(store.reactivateParticipant(joined.id, 'member', 10)).rejects.toBeInstanceOf(ParticipantConflictError);
    });

    it('refuses a second active owner', async () => {
      const alice = await store.createUser('alice');
      const bob = await store.createUser('bob');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Room' });
      const member = await store.addParticipant({ sessionId: session.id, userId: bob.id, role: 'member', capacity: 10 });

      await expect(store.updateParticipant(member.id, { role: 'owner' })).rejects.toThrow();
    });

    it('transfers ownership atomically', async () => {
      const alice = await store.createUser('alice');
      const bob = await store.createUser('bob');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Room' });
      await store.addParticipant({ sessionId: session.id, userId: bob.id, role: 'member', capacity: 10 });

      const newOwner = await store.transferOwnership(session.id, alice.id, bob.id);

      expect(newOwner).toMatchObject({ userId: bob.id, role: 'owner' });
      expect((await store.getParticipant(session.id, alice.id))?.role).toBe('admin');
      expect((await store.getSession(session.id))?.ownerId).toBe(bob.id);
    });

    it('rolls back a transfer to a non-participant', async () => {
      const alice = await store.createUser('alice');
      const stranger = await store.createUser('stranger');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Room' });

      await expect(store.transferOwnership(session.id, alice.id, stranger.id)).rejects.toBeInstanceOf(SessionStateError);
      expect((await store.getParticipant(session.id, alice.id))?.role).toBe('owner');
    });

    it('lists joined sessions and joinable public sessions', async () => {
      const alice = await store.createUser('alice');
      const bob = await store.createUser('bob');
      const { session: open } = await store.createSessionWithOwner(alice.id, { title: 'Open', kind: 'public' });
      await store.createSessionWithOwner(alice.id, { title: 'Closed' });
      await store.appendMessage({ sessionId: open.id, authorId: alice.id, role: 'user', content: 'hi' });

      const mine = await store.listSessionsForUser(alice.id);
      expect(mine.map((s) => s.title)).toEqual(['Closed', 'Open']);
      expect(mine.find((s) => s.id === open.id)).toMatchObject({ messageCount: 1, participantCount: 1 });

      expect((await store.listPublicSessions(bob.id)).map((s) => s.title)).toEqual(['Open']);
      expect(await store.listPublicSessions(alice.id)).toEqual([]);
    });
  });

  describe('messages', () => {
    it('returns recent messages newest first and pages oldest first', async () => {
      const alice = await store.createUser('alice');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Room' });
      for (const content of ['one', 'two', 'three', 'four']) {
        await store.appendMessage({ sessionId: session.id, authorId: alice.id, role: 'user', content });
      }

      expect((await store.listRecentMessages(session.id, 2)).map((m) => m.content)).toEqual(['four', 'three']);
      expect((await store.listMessages(session.id, { skip: 1, limit: 2 })).map((m) => m.content)).toEqual(['two', 'three']);
      expect(await store.countMessages(session.id)).toBe(4);
    });

    it('stores assistant messages without an author', async () => {
      const alice = await store.createUser('alice');
      const { session } = await store.createSessionWithOwner(alice.id, { title: 'Room' });
      const reply = await store.appendMessage({ sessionId: session.id, authorId: null, role: 'assistant', content: 'ok' });
      expect(reply).toMatchObject({ authorId: null, role: 'assistant', content: 'ok' });
    });
  });

  it('refuses to work after close', async () => {
    await store.close();
    await expect(store.getUser(1)).rejects.toBeInstanceOf(StorageError);
  });
});
