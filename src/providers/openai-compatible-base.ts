/**
 * OpenAI 兼容 API 基类
 *
 * 提供所有 OpenAI 兼容 API 的公共逻辑：
 * 消息格式化、请求发送、响应解析。
 */

import { z } from 'zod';
import type { ConversationTurn } from '../types/chat.js';
import type { ResponseGenerator } from '../types/provider.js';
import type { ResponderConfig } from '../types/config.js';
import { ResponderError } from '../core/errors.js';
import { createChildLogger } from '../core/logger.js';

/** OpenAI API 消息格式 */
export interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** OpenAI API 响应（只校验用到的字段） */
const OpenAIResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number(),
    })
    .optional(),
});

/** 基类初始化选项 */
export interface OpenAICompatibleOptions {
  /** 提供商名称（用于日志和错误信息） */
  providerName: string;
  /** 默认 API Base URL */
  defaultApiBase: string;
  /** API Key 缺失时的错误提示 */
  apiKeyMissingMessage: string;
  /** 额外的请求头 */
  extraHeaders?: Record<string, string>;
}

/**
 * OpenAI 兼容 API 基类
 */
export abstract class OpenAICompatibleResponder implements ResponseGenerator {
  abstract readonly name: string;

  protected readonly apiKey: string;
  protected readonly apiBase: string;
  protected readonly extraHeaders: Record<string, string>;
  protected readonly providerName: string;
  protected readonly log: ReturnType<typeof createChildLogger>;

  constructor(
    protected readonly config: ResponderConfig,
    options: OpenAICompatibleOptions,
  ) {
    this.providerName = options.providerName;
    this.log = createChildLogger(options.providerName);

    if (!config.apiKey) {
      throw new ResponderError(options.providerName, options.apiKeyMissingMessage);
    }

    this.apiKey = config.apiKey;
    this.apiBase = (config.apiBase ?? options.defaultApiBase).replace(/\/+$/, '');
    this.extraHeaders = options.extraHeaders ?? {};
  }

  async generate(history: ConversationTurn[], message: string, signal?: AbortSignal): Promise<string> {
    const body = {
      model: this.config.model,
      messages: this.formatMessages(history, message),
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
    };

    this.log.debug({ model: body.model, messageCount: body.messages.length }, '发送补全请求');

    const url = `${this.apiBase}/chat/completions`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
          ...this.extraHeaders,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw new ResponderError(
        this.providerName,
        `API 请求失败: ${err instanceof Error ? err.message : String(err)}`,
        { url },
        { cause: err },
      );
    }

    if (!response.ok) {
      let errorBody: string;
      try {
        errorBody = await response.text();
      } catch (err) {
        errorBody = `无法读取错误响应: ${err instanceof Error ? err.message : String(err)}`;
      }
      throw new ResponderError(
        this.providerName,
        `API 返回错误: ${response.status} ${response.statusText}`,
        { status: response.status, body: errorBody },
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new ResponderError(this.providerName, '响应解析失败', undefined, { cause: err });
    }

    const parsed = OpenAIResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ResponderError(this.providerName, '响应格式不符合预期', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const choice = parsed.data.choices[0];
    const content = choice?.message.content?.trim() ?? '';

    this.log.debug({
      finishReason: choice?.finish_reason ?? null,
      tokens: parsed.data.usage?.total_tokens ?? 0,
    }, '补全响应');

    return content;
  }

  /**
   * 格式化消息为 OpenAI 格式
   *
   * history 的最后一条若就是当前消息则不再重复追加。
   */
  protected formatMessages(history: ConversationTurn[], message: string): OpenAIMessage[] {
    const result: OpenAIMessage[] = [];

    if (this.config.systemPrompt) {
      result.push({ role: 'system', content: this.config.systemPrompt });
    }

    for (const turn of history) {
      result.push({
        role: turn.role === 'user' ? 'user' : 'assistant',
        content: turn.content,
      });
    }

    const last = history[history.length - 1];
    if (!last || last.role !== 'user' || last.content !== message) {
      result.push({ role: 'user', content: message });
    }

    return result;
  }
}
