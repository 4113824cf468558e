/**
 * 应用核心 - 组装和启动所有组件
 */

import type { Config } from '../types/config.js';
import type { ResponseGenerator } from '../types/provider.js';
import type { Channel } from '../channels/base-channel.js';
import { SqliteStorageProvider, type StorageProvider } from '../storage/index.js';
import { ConnectionRegistry } from './connection-registry.js';
import { SessionLifecycleService } from './session-service.js';
import { JwtAuthenticator } from './authenticator.js';
import { ProtocolHandler } from './protocol-handler.js';
import { createResponder } from '../providers/provider-factory.js';
import { WsGateway } from '../channels/ws-gateway.js';
import { setLogLevel, createChildLogger } from './logger.js';
import { ChannelError, ConfigError } from './errors.js';

const log = createChildLogger('App');

/**
 * 根据配置创建 StorageProvider
 */
export function createStorageProvider(config: Config): StorageProvider {
  switch (config.storage.type) {
    case 'sqlite':
      return new SqliteStorageProvider({ dbPath: config.storage.sqlitePath });
    default:
      throw new ConfigError(`不支持的存储类型: ${String(config.storage.type)}`);
  }
}

/** 可替换的组件（测试注入） */
export interface HuddleAppOverrides {
  storage?: StorageProvider;
  responder?: ResponseGenerator;
}

/**
 * Huddle 应用实例
 */
export class HuddleApp {
  readonly storage: StorageProvider;
  readonly registry: ConnectionRegistry;
  readonly sessions: SessionLifecycleService;
  readonly authenticator: JwtAuthenticator;
  readonly gateway: WsGateway;
  private readonly config: Config;
  private readonly responder: ResponseGenerator;
  private readonly channels: Channel[] = [];
  private started = false;

  constructor(config: Config, overrides: HuddleAppOverrides = {}) {
    this.config = config;

    // 设置日志级别
    setLogLevel(config.logLevel);

    log.info('初始化 Huddle...');

    // 初始化存储层
    this.storage = overrides.storage ?? createStorageProvider(config);

    // 初始化核心组件（注入 StorageProvider）
    this.registry = new ConnectionRegistry();
    this.sessions = new SessionLifecycleService(this.storage);
    this.authenticator = new JwtAuthenticator(this.storage, config.auth);
    this.responder = overrides.responder ?? createResponder(config.responder);

    const handler = new ProtocolHandler({
      registry: this.registry,
      authenticator: this.authenticator,
      sessions: this.sessions,
      responder: this.responder,
      historyWindow: config.responder.historyWindow,
    });

    // 初始化通道
    this.gateway = new WsGateway({ handler, registry: this.registry, server: config.server });
    this.channels.push(this.gateway);

    log.info({ responder: this.responder.name }, 'Huddle 初始化完成');
  }

  /**
   * 启动应用
   */
  async start(): Promise<void> {
    log.info('启动 Huddle...');

    // 初始化存储层（建表、连接等）
    await this.storage.init();
    log.info({ type: this.config.storage.type }, '存储层已初始化');

    // 启动所有通道
    const channelResults = await Promise.allSettled(
      this.channels.map((ch) => ch.start()),
    );

    // 检查通道启动结果
    const failures: unknown[] = [];
    channelResults.forEach((result, i) => {
      const name = this.channels[i]?.name ?? 'unknown';
      if (result.status === 'rejected') {
        log.error({ channel: name, err: result.reason }, '通道启动失败');
        failures.push(result.reason);
      } else {
        log.info({ channel: name }, '通道已启动');
      }
    });

    if (failures.length > 0) {
      await this.storage.close();
      throw new ChannelError(this.gateway.name, `${failures.length} 个通道启动失败`, { cause: failures[0] });
    }

    this.started = true;
    log.info('Huddle 已启动');
  }

  /**
   * 停止应用
   */
  async stop(): Promise<void> {
    log.info('停止 Huddle...');

    if (this.started) {
      // 停止所有通道
      const results = await Promise.allSettled(
        this.channels.map((ch) => ch.stop()),
      );
      for (const result of results) {
        if (result.status === 'rejected') {
          log.error({ err: result.reason }, '通道停止失败');
        }
      }
      this.started = false;
    }

    // 关闭存储层
    await this.storage.close();
    log.info('存储层已关闭');

    log.info('Huddle 已停止');
  }
}
