#!/usr/bin/env node

/**
 * Huddle - 多用户实时聊天服务
 *
 * 入口文件：解析 CLI 参数，启动服务或执行管理命令。
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/config-manager.js';
import { HuddleApp, createStorageProvider } from './core/app.js';
import { SessionLifecycleService } from './core/session-service.js';
import { JwtAuthenticator } from './core/authenticator.js';
import { logger, setLogLevel } from './core/logger.js';
import type { StorageProvider } from './storage/index.js';
import {
  PARTICIPANT_ROLES,
  SESSION_KINDS,
  type Config,
  type ParticipantRole,
  type SessionKind,
} from './types/index.js';

/** 管理命令的运行环境 */
interface AdminContext {
  config: Config;
  storage: StorageProvider;
  sessions: SessionLifecycleService;
  authenticator: JwtAuthenticator;
}

function parseId(value: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidArgumentError('必须为正整数');
  }
  return id;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(n)) {
    throw new InvalidArgumentError('必须为非负整数');
  }
  return n;
}

function parseKind(value: string): SessionKind {
  const kind = SESSION_KINDS.find((k) => k === value);
  if (!kind) {
    throw new InvalidArgumentError(`可选值: ${SESSION_KINDS.join(', ')}`);
  }
  return kind;
}

function parseRole(value: string): ParticipantRole {
  const role = PARTICIPANT_ROLES.find((r) => r === value);
  if (!role) {
    throw new InvalidArgumentError(`可选值: ${PARTICIPANT_ROLES.join(', ')}`);
  }
  return role;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** 隐藏配置中的密钥 */
function redact(config: Config): Config {
  return {
    ...config,
    auth: { ...config.auth, jwtSecret: '***' },
    responder: { ...config.responder, apiKey: config.responder.apiKey ? '***' : undefined },
  };
}

const program = new Command();

program
  .name('huddle')
  .description('多用户实时聊天服务')
  .version('0.1.0')
  .option('-c, --config <path>', '配置文件路径');

function configPath(): string | undefined {
  return program.opts<{ config?: string }>().config;
}

/**
 * 初始化存储后执行管理命令，结束时关闭存储
 */
async function runAdmin(task: (ctx: AdminContext) => Promise<void>): Promise<void> {
  let storage: StorageProvider | null = null;
  try {
    const config = await loadConfig(configPath());
    setLogLevel(config.logLevel === 'info' ? 'warn' : config.logLevel);
    storage = createStorageProvider(config);
    await storage.init();
    await task({
      config,
      storage,
      sessions: new SessionLifecycleService(storage),
      authenticator: new JwtAuthenticator(storage, config.auth),
    });
  } catch (err) {
    logger.error({ err }, '命令执行失败');
    process.exitCode = 1;
  } finally {
    await storage?.close();
  }
}

program
  .command('start', { isDefault: true })
  .description('启动聊天服务')
  .option('-p, --port <port>', '监听端口', parseCount)
  .option('-v, --verbose', '详细日志输出')
  .action(async (options: { port?: number; verbose?: boolean }) => {
    try {
      // 设置环境变量覆盖
      if (options.port !== undefined) {
        process.env['PORT'] = String(options.port);
      }
      if (options.verbose) {
        process.env['HUDDLE_LOG_LEVEL'] = 'debug';
      }

      // 加载配置
      const config = await loadConfig(configPath());

      // 创建并启动应用
      const app = new HuddleApp(config);

      // 优雅关闭
      const shutdown = async (): Promise<void> => {
        logger.info('收到关闭信号...');
        try {
          await app.stop();
          process.exit(0);
        } catch (err) {
          logger.fatal({ err }, '关闭失败');
          process.exit(1);
        }
      };

      process.on('SIGINT', () => void shutdown());
      process.on('SIGTERM', () => void shutdown());

      await app.start();
    } catch (err) {
      logger.fatal({ err }, '启动失败');
      process.exit(1);
    }
  });

program
  .command('config')
  .description('验证并显示当前配置（隐藏密钥）')
  .action(async () => {
    try {
      const config = await loadConfig(configPath());
      print(redact(config));
    } catch (err) {
      logger.error({ err }, '配置验证失败');
      process.exit(1);
    }
  });

// ─── 用户 ───

const user = program.command('user').description('用户管理');

user
  .command('add <username>')
  .description('创建用户')
  .action((username: string) =>
    runAdmin(async ({ storage }) => {
      print(await storage.createUser(username));
    }),
  );

user
  .command('disable <userId>')
  .description('停用用户（已签发的 token 随即失效）')
  .action((userId: string) =>
    runAdmin(async ({ storage }) => {
      await storage.setUserActive(parseId(userId), false);
      print({ userId: parseId(userId), isActive: false });
    }),
  );

user
  .command('enable <userId>')
  .description('启用用户')
  .action((userId: string) =>
    runAdmin(async ({ storage }) => {
      await storage.setUserActive(parseId(userId), true);
      print({ userId: parseId(userId), isActive: true });
    }),
  );

program
  .command('token <userId>')
  .description('为用户签发访问 token')
  .action((userId: string) =>
    runAdmin(async ({ storage, authenticator, config }) => {
      const id = parseId(userId);
      const found = await storage.getUser(id);
      if (!found?.isActive) {
        throw new InvalidArgumentError(`用户不存在或已停用: ${id}`);
      }
      print({ token: authenticator.issueToken(id), expiresIn: config.auth.tokenTtlSeconds });
    }),
  );

// ─── 会话 ───

const session = program.command('session').description('会话管理');

session
  .command('create <ownerId> <title>')
  .description('创建会话')
  .option('-k, --kind <kind>', '可见性: private | public | invite_only', parseKind)
  .option('-m, --max <count>', '人数上限 (2-100)', parseCount)
  .option('-d, --description <text>', '描述')
  .action((ownerId: string, title: string, options: { kind?: SessionKind; max?: number; description?: string }) =>
    runAdmin(async ({ sessions }) => {
      const created = await sessions.createSession(parseId(ownerId), {
        title,
        description: options.description ?? null,
        kind: options.kind,
        maxParticipants: options.max,
      });
      print(created);
    }),
  );

session
  .command('update <sessionId> <actorId>')
  .description('修改会话设置')
  .option('-t, --title <title>', '标题')
  .option('-k, --kind <kind>', '可见性', parseKind)
  .option('-m, --max <count>', '人数上限', parseCount)
  .option('-d, --description <text>', '描述')
  .action((
    sessionId: string,
    actorId: string,
    options: { title?: string; kind?: SessionKind; max?: number; description?: string },
  ) =>
    runAdmin(async ({ sessions }) => {
      const updated = await sessions.updateSession(parseId(sessionId), parseId(actorId), {
        ...(options.title !== undefined ? { title: options.title } : {}),
        ...(options.kind !== undefined ? { kind: options.kind } : {}),
        ...(options.max !== undefined ? { maxParticipants: options.max } : {}),
        ...(options.description !== undefined ? { description: options.description } : {}),
      });
      print(updated);
    }),
  );

session
  .command('join <sessionId> <userId>')
  .description('加入公开会话')
  .action((sessionId: string, userId: string) =>
    runAdmin(async ({ sessions }) => {
      print(await sessions.join(parseId(sessionId), parseId(userId)));
    }),
  );

session
  .command('invite <sessionId> <actorId> <targetUserId>')
  .description('邀请用户加入会话')
  .option('-r, --role <role>', '角色: admin | member | viewer', parseRole, 'member')
  .action((sessionId: string, actorId: string, targetUserId: string, options: { role: ParticipantRole }) =>
    runAdmin(async ({ sessions }) => {
      print(await sessions.invite(parseId(sessionId), parseId(actorId), parseId(targetUserId), options.role));
    }),
  );

session
  .command('role <sessionId> <actorId> <targetUserId> <role>')
  .description('修改成员角色（设为 owner 即转让所有权）')
  .action((sessionId: string, actorId: string, targetUserId: string, role: string) =>
    runAdmin(async ({ sessions }) => {
      print(await sessions.changeRole(parseId(sessionId), parseId(actorId), parseId(targetUserId), parseRole(role)));
    }),
  );

session
  .command('remove <sessionId> <actorId> <targetUserId>')
  .description('移除成员')
  .action((sessionId: string, actorId: string, targetUserId: string) =>
    runAdmin(async ({ sessions }) => {
      await sessions.removeParticipant(parseId(sessionId), parseId(actorId), parseId(targetUserId));
      print({ removed: true });
    }),
  );

session
  .command('leave <sessionId> <userId>')
  .description('离开会话')
  .action((sessionId: string, userId: string) =>
    runAdmin(async ({ sessions }) => {
      await sessions.leave(parseId(sessionId), parseId(userId));
      print({ left: true });
    }),
  );

session
  .command('delete <sessionId> <actorId>')
  .description('删除会话（仅 owner）')
  .action((sessionId: string, actorId: string) =>
    runAdmin(async ({ sessions }) => {
      await sessions.deleteSession(parseId(sessionId), parseId(actorId));
      print({ deleted: true });
    }),
  );

session
  .command('list <userId>')
  .description('列出用户的会话')
  .option('--public', '改为列出可加入的公开会话')
  .action((userId: string, options: { public?: boolean }) =>
    runAdmin(async ({ sessions }) => {
      const id = parseId(userId);
      print(options.public ? await sessions.listPublicSessions(id) : await sessions.listUserSessions(id));
    }),
  );

session
  .command('members <sessionId> <userId>')
  .description('列出会话成员')
  .action((sessionId: string, userId: string) =>
    runAdmin(async ({ sessions }) => {
      print(await sessions.listParticipants(parseId(sessionId), parseId(userId)));
    }),
  );

session
  .command('messages <sessionId> <userId>')
  .description('分页读取会话消息')
  .option('--skip <n>', '跳过条数', parseCount, 0)
  .option('--limit <n>', '读取条数 (1-100)', parseCount, 50)
  .action((sessionId: string, userId: string, options: { skip: number; limit: number }) =>
    runAdmin(async ({ sessions }) => {
      print(await sessions.getMessages(parseId(sessionId), parseId(userId), options));
    }),
  );

program.parseAsync().catch((err: unknown) => {
  logger.fatal({ err }, '命令解析失败');
  process.exit(1);
});
