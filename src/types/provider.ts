/**
 * 回复生成器类型定义
 */

import type { ConversationTurn } from './chat.js';

/** 回复生成器接口 */
export interface ResponseGenerator {
  /** 生成器名称（日志用） */
  readonly name: string;
  /**
   * 基于最近的对话生成一条回复
   *
   * history 为时间正序，最后一条通常就是 message 本身。
   * signal 触发后实现应尽快放弃。
   */
  generate(history: ConversationTurn[], message: string, signal?: AbortSignal): Promise<string>;
}
