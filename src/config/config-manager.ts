/**
 * 配置管理器
 *
 * 加载 .env 文件、JSON 配置文件，应用环境变量覆盖，并使用 Zod 进行运行时验证。
 *
 * 加载顺序（优先级从低到高）：
 * 1. JSON 配置文件（config/config.json 等）
 * 2. .env 文件中的环境变量
 * 3. 系统环境变量
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import { ConfigSchema, type Config } from '../types/config.js';
import { ConfigError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('ConfigManager');

/** 默认配置文件路径列表（按优先级从高到低） */
export const DEFAULT_CONFIG_PATHS = [
  'config/config.json',
  'config/default.json',
  'huddle.config.json',
];

type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * 从文件加载原始 JSON 配置
 */
async function loadConfigFile(configPath: string): Promise<RawConfig> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`配置文件不存在: ${absolutePath}`, { path: absolutePath });
  }

  let parsed: unknown;
  try {
    const content = await readFile(absolutePath, 'utf-8');
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(
      `配置文件解析失败: ${absolutePath}`,
      { path: absolutePath },
      { cause: err },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`配置文件顶层必须是对象: ${absolutePath}`, { path: absolutePath });
  }
  return parsed;
}

/**
 * 加载 .env 文件并注入到 process.env
 *
 * 使用 dotenv 库，默认不覆盖已有的环境变量。
 * 文件不存在时跳过（容器环境直接通过系统环境变量注入）。
 */
function loadEnvFile(): void {
  const envPath = resolve('.env');
  if (existsSync(envPath)) {
    const result = dotenvConfig({ path: envPath });
    if (result.parsed) {
      log.info({ count: Object.keys(result.parsed).length }, '已加载 .env');
    }
  } else {
    log.debug('未找到 .env 文件，跳过（使用系统环境变量）');
  }
}

/** 整数环境变量；非法值原样保留，交给 Zod 报错 */
function intEnv(value: string): number | string {
  return /^-?\d+$/.test(value.trim()) ? parseInt(value, 10) : value;
}

/**
 * 从环境变量中提取配置覆盖
 *
 * 支持以下环境变量:
 * - HUDDLE_LOG_LEVEL: 日志级别
 * - PORT / HUDDLE_HOST / HUDDLE_WS_PATH: 监听端口、地址与 WebSocket 路径
 * - HUDDLE_JWT_SECRET / HUDDLE_TOKEN_TTL: JWT 密钥与签发有效期（秒）
 * - HUDDLE_DB_PATH: SQLite 数据库路径
 * - HUDDLE_RESPONDER / HUDDLE_RESPONDER_TIMEOUT_MS / HUDDLE_MODEL: 回复生成器
 * - OPENAI_API_KEY / OPENAI_API_BASE: OpenAI 兼容 API
 */
export function getEnvOverrides(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overrides: RawConfig = {};

  if (env['HUDDLE_LOG_LEVEL']) {
    overrides['logLevel'] = env['HUDDLE_LOG_LEVEL'];
  }

  const server: RawConfig = {};
  if (env['PORT']) {
    server['port'] = intEnv(env['PORT']);
  }
  if (env['HUDDLE_HOST']) {
    server['host'] = env['HUDDLE_HOST'];
  }
  if (env['HUDDLE_WS_PATH']) {
    server['wsPath'] = env['HUDDLE_WS_PATH'];
  }
  if (Object.keys(server).length > 0) {
    overrides['server'] = server;
  }

  const auth: RawConfig = {};
  if (env['HUDDLE_JWT_SECRET']) {
    auth['jwtSecret'] = env['HUDDLE_JWT_SECRET'];
  }
  if (env['HUDDLE_TOKEN_TTL']) {
    auth['tokenTtlSeconds'] = intEnv(env['HUDDLE_TOKEN_TTL']);
  }
  if (Object.keys(auth).length > 0) {
    overrides['auth'] = auth;
  }

  if (env['HUDDLE_DB_PATH']) {
    overrides['storage'] = { sqlitePath: env['HUDDLE_DB_PATH'] };
  }

  const responder: RawConfig = {};
  if (env['HUDDLE_RESPONDER']) {
    responder['kind'] = env['HUDDLE_RESPONDER'];
  }
  if (env['HUDDLE_RESPONDER_TIMEOUT_MS']) {
    responder['timeoutMs'] = intEnv(env['HUDDLE_RESPONDER_TIMEOUT_MS']);
  }
  if (env['HUDDLE_MODEL']) {
    responder['model'] = env['HUDDLE_MODEL'];
  }
  if (env['OPENAI_API_KEY']) {
    responder['apiKey'] = env['OPENAI_API_KEY'];
  }
  if (env['OPENAI_API_BASE']) {
    responder['apiBase'] = env['OPENAI_API_BASE'];
  }
  if (Object.keys(responder).length > 0) {
    overrides['responder'] = responder;
  }

  return overrides;
}

/**
 * 深度合并两个对象
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }

  return result;
}

/**
 * 校验原始配置
 */
export function parseConfig(rawConfig: unknown): Config {
  const parseResult = ConfigSchema.safeParse(rawConfig);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`配置验证失败: ${errors.join('; ')}`, { errors });
  }
  return parseResult.data;
}

/**
 * 加载并验证配置
 *
 * 1. 尝试从指定路径或默认路径加载配置文件
 * 2. 应用环境变量覆盖
 * 3. 使用 Zod Schema 验证
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  // 首先加载 .env 文件
  loadEnvFile();

  let rawConfig: RawConfig = {};

  if (configPath) {
    // 明确指定了配置文件路径
    rawConfig = await loadConfigFile(configPath);
    log.info({ path: configPath }, '已加载配置文件');
  } else {
    // 尝试从默认路径加载
    for (const defaultPath of DEFAULT_CONFIG_PATHS) {
      const absolutePath = resolve(defaultPath);
      if (existsSync(absolutePath)) {
        rawConfig = await loadConfigFile(absolutePath);
        log.info({ path: absolutePath }, '已加载配置文件');
        break;
      }
    }

    if (Object.keys(rawConfig).length === 0) {
      log.info('未找到配置文件，使用默认配置');
    }
  }

  // 应用环境变量覆盖
  const envOverrides = getEnvOverrides();
  if (Object.keys(envOverrides).length > 0) {
    rawConfig = deepMerge(rawConfig, envOverrides);
    log.debug({ overrides: Object.keys(envOverrides) }, '已应用环境变量覆盖');
  }

  return parseConfig(rawConfig);
}
