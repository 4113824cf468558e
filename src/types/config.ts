/**
 * 配置类型定义
 */

import { z } from 'zod';

/** 服务监听配置 Schema */
const ServerConfigSchema = z.object({
  host: z.string().default('localhost'),
  /** 0 表示由系统分配端口 */
  port: z.number().int().min(0).max(65535).default(8000),
  /** WebSocket 升级路径 */
  wsPath: z.string().startsWith('/').default('/ws'),
  /** 单帧最大字节数 */
  maxPayloadBytes: z.number().int().positive().default(64 * 1024),
});

/** 认证配置 Schema */
const AuthConfigSchema = z.object({
  /** JWT 签名密钥 */
  jwtSecret: z.string().min(1, '必须配置 JWT 密钥（HUDDLE_JWT_SECRET）'),
  algorithms: z.array(z.enum(['HS256', 'HS384', 'HS512'])).min(1).default(['HS256']),
  /** 签发 token 的有效期（秒） */
  tokenTtlSeconds: z.number().int().positive().default(30 * 60),
});

/** 存储配置 Schema */
const StorageConfigSchema = z.object({
  type: z.enum(['sqlite']).default('sqlite'),
  /** SQLite 数据库文件路径，':memory:' 为内存库 */
  sqlitePath: z.string().default('data/huddle.db'),
});

/** 回复生成器配置 Schema */
const ResponderConfigSchema = z.object({
  kind: z.enum(['mock', 'openai']).default('mock'),
  /** 单次生成的超时时间，超时后回退为致歉文案 */
  timeoutMs: z.number().int().positive().default(15_000),
  /** 同时进行的生成调用上限 */
  maxConcurrent: z.number().int().positive().default(8),
  /** 作为上下文的最近消息条数 */
  historyWindow: z.number().int().positive().default(10),
  /** mock 生成器模拟的延迟 */
  mockLatencyMs: z.number().int().min(0).default(1000),
  model: z.string().default('gpt-4o-mini'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(500),
  systemPrompt: z.string().default('You are a helpful AI assistant. Provide clear, accurate, and helpful responses.'),
  apiKey: z.string().optional(),
  apiBase: z.string().url().optional(),
});

/** 顶层配置 Schema */
export const ConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  auth: AuthConfigSchema,
  storage: StorageConfigSchema.default({}),
  responder: ResponderConfigSchema.default({}),
  /** 日志级别 */
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

/** 配置类型（从 Schema 推断） */
export type Config = z.infer<typeof ConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type ResponderConfig = z.infer<typeof ResponderConfigSchema>;
