/**
 * OpenAI 回复生成器
 *
 * 支持 OpenAI API 及所有兼容 API（通过 apiBase 指定）。
 */

import type { ResponderConfig } from '../types/config.js';
import { OpenAICompatibleResponder } from './openai-compatible-base.js';

/**
 * OpenAI 回复生成器
 */
export class OpenAIResponder extends OpenAICompatibleResponder {
  readonly name = 'openai';

  constructor(config: ResponderConfig) {
    super(config, {
      providerName: 'OpenAIResponder',
      defaultApiBase: 'https://api.openai.com/v1',
      apiKeyMissingMessage: 'API Key 未配置，请设置 OPENAI_API_KEY 环境变量或在配置中指定',
    });
  }
}
