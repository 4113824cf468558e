import { z } from 'zod';
import type { ConnectionHandle } from '../src/core/connection-registry.js';
import { SqliteStorageProvider } from '../src/storage/sqlite-provider.js';
import { MESSAGE_ROLES } from '../src/types/chat.js';
import { parseConfig } from '../src/config/config-manager.js';
import type { Config } from '../src/types/config.js';

const ServerFrameSchema = z.object({
  type: z.enum(['chat_message', 'system_message', 'pong', 'error']),
  content: z.string(),
  session_id: z.number().nullable(),
  timestamp: z.string().nullable(),
  user_id: z.number().nullable().optional(),
  message_id: z.number().optional(),
  role: z.enum(MESSAGE_ROLES).optional(),
});

export type DecodedFrame = z.infer<typeof ServerFrameSchema>;

export function decodeFrame(payload: string): DecodedFrame {
  return ServerFrameSchema.parse(JSON.parse(payload));
}

/**
 * 进程内连接替身：记录写出的帧，可模拟写失败
 */
export class FakeConnection implements ConnectionHandle {
  readonly sent: string[] = [];
  isOpen = true;
  failSends = false;
  closedWith: { code: number; reason: string } | null = null;

  constructor(readonly id: string) {}

  async send(payload: string): Promise<void> {
    if (this.failSends) {
      throw new Error('socket closed');
    }
    this.sent.push(payload);
  }

  close(code: number, reason: string): void {
    this.closedWith = { code, reason };
    this.isOpen = false;
  }

  frames(): DecodedFrame[] {
    return this.sent.map(decodeFrame);
  }
}

/** 单调递增的时钟，保证消息按插入顺序排序 */
export function steppingClock(start = 1_700_000_000_000): () => number {
  let now = start;
  return () => ++now;
}

export async function createMemoryStore(): Promise<SqliteStorageProvider> {
  const store = new SqliteStorageProvider({ dbPath: ':memory:', now: steppingClock() });
  await store.init();
  return store;
}

export function createTestConfig(overrides: Record<string, unknown> = {}): Config {
  return parseConfig({
    server: { host: '127.0.0.1', port: 0 },
    auth: { jwtSecret: 'test-secret' },
    storage: { sqlitePath: ':memory:' },
    responder: { kind: 'mock', mockLatencyMs: 0, timeoutMs: 1000 },
    logLevel: 'silent',
    ...overrides,
  });
}
