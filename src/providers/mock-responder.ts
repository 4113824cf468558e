/**
 * 关键词回复生成器
 *
 * 不依赖外部服务：按关键词挑选预设回复，并模拟一段处理延迟。
 * 默认生成器，用于本地开发与测试。
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ConversationTurn } from '../types/chat.js';
import type { ResponseGenerator } from '../types/provider.js';

/** 关键词规则：命中任一关键词即使用该组回复 */
interface ReplyRule {
  matches: (message: string, lower: string) => boolean;
  replies: (message: string) => string[];
}

/** 英文关键词按整词匹配，中文关键词按子串匹配 */
function anyKeyword(...keywords: string[]): ReplyRule['matches'] {
  const tests = keywords.map((keyword): ((lower: string) => boolean) => {
    if (/^[a-z ]+$/.test(keyword)) {
      const pattern = new RegExp(`\\b${keyword}\\b`);
      return (lower) => pattern.test(lower);
    }
    return (lower) => lower.includes(keyword);
  });
  return (_message, lower) => tests.some((test) => test(lower));
}

const RULES: ReplyRule[] = [
  {
    matches: anyKeyword('hello', 'hi', 'hey', '你好', '嗨'),
    replies: () => [
      '你好！今天有什么可以帮你的？',
      '嗨！想了解些什么？',
      '你好，我在这里，随时可以帮忙。',
    ],
  },
  {
    matches: anyKeyword('thanks', 'thank you', '谢谢', '感谢'),
    replies: () => [
      '不客气！还有其他需要帮忙的吗？',
      '很高兴能帮上忙，有需要随时说。',
      '不用谢，欢迎继续提问。',
    ],
  },
  {
    matches: (message) => message.includes('?') || message.includes('？'),
    replies: (message) => [
      `关于「${message.replace(/[?？]+$/u, '')}」这个问题，我来帮你梳理一下……`,
      '好问题，我来试着回答一下……',
      '这个问题很有意思，以下是我的看法……',
    ],
  },
  {
    matches: anyKeyword('help', 'assist', 'support', '帮助', '帮忙'),
    replies: () => [
      '我可以帮你解答问题、解释概念、一起分析思路，你想从哪里开始？',
      '乐意效劳，具体需要哪方面的帮助？',
    ],
  },
  {
    matches: anyKeyword('weather', 'temperature', '天气', '气温'),
    replies: () => [
      '我无法获取实时天气，建议查看当地的天气预报服务。',
    ],
  },
  {
    matches: anyKeyword('time', 'date', '时间', '日期'),
    replies: () => [
      '我无法获取实时时间，请以设备时钟为准。',
    ],
  },
];

function fallbackReplies(message: string): string[] {
  const preview = message.length > 50 ? `${message.slice(0, 50)}…` : message;
  return [
    `我理解你在说「${preview}」，可以再多讲一些背景吗？`,
    '能具体说说你希望我关注哪一方面吗？',
    '收到，我们可以从这里继续深入。',
  ];
}

/** 给定消息的候选回复 */
export function candidateReplies(message: string): string[] {
  const lower = message.toLowerCase();
  const rule = RULES.find((r) => r.matches(message, lower));
  return rule ? rule.replies(message) : fallbackReplies(message);
}

/** 关键词生成器选项 */
export interface MockResponderOptions {
  /** 模拟延迟（毫秒） */
  latencyMs?: number;
  /** 从 count 个候选中选一个下标，默认随机 */
  pick?: (count: number) => number;
}

/**
 * 关键词回复生成器
 */
export class MockResponder implements ResponseGenerator {
  readonly name = 'mock';

  private readonly latencyMs: number;
  private readonly pick: (count: number) => number;

  constructor(options: MockResponderOptions = {}) {
    this.latencyMs = options.latencyMs ?? 1000;
    this.pick = options.pick ?? ((count) => Math.floor(Math.random() * count));
  }

  async generate(_history: ConversationTurn[], message: string, signal?: AbortSignal): Promise<string> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, undefined, { signal });
    }
    const replies = candidateReplies(message.trim());
    return replies[this.pick(replies.length)] ?? replies[0] ?? '';
  }
}
