/**
 * 回复生成器工厂
 *
 * 根据配置创建对应的生成器，并统一套上超时与并发保护。
 */

import type { ResponseGenerator } from '../types/provider.js';
import type { ResponderConfig } from '../types/config.js';
import { MockResponder } from './mock-responder.js';
import { OpenAIResponder } from './openai-provider.js';
import { GuardedResponder } from './guarded-responder.js';
import { ResponderError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

const log = createChildLogger('ResponderFactory');

/** 已注册的生成器构造函数 */
const responderBuilders: Record<string, (config: ResponderConfig) => ResponseGenerator> = {
  mock: (config) => new MockResponder({ latencyMs: config.mockLatencyMs }),
  openai: (config) => new OpenAIResponder(config),
};

/**
 * 创建回复生成器（已包装超时与并发保护）
 */
export function createResponder(config: ResponderConfig): ResponseGenerator {
  const build = responderBuilders[config.kind];
  if (!build) {
    throw new ResponderError(config.kind, `不支持的回复生成器: ${config.kind}`);
  }

  log.info({ responder: config.kind, timeoutMs: config.timeoutMs, maxConcurrent: config.maxConcurrent }, '创建回复生成器');
  return new GuardedResponder(build(config), {
    timeoutMs: config.timeoutMs,
    maxConcurrent: config.maxConcurrent,
  });
}
