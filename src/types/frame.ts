/**
 * 实时协议帧定义
 *
 * 客户端只会发送 chat_message / ping；其余类型仅由服务端下发。
 * 入站解析返回带标签的结果，不依赖异常做流程控制。
 */

import { z } from 'zod';
import type { MessageRole, StoredMessage } from './chat.js';

/** 服务端下发的帧类型 */
export type ServerFrameType = 'chat_message' | 'system_message' | 'pong' | 'error';

/** 下发帧 */
export interface ServerFrame {
  type: ServerFrameType;
  content: string;
  session_id: number | null;
  /** ISO-8601 */
  timestamp: string | null;
  /** chat_message：作者用户 ID，助手消息为 null */
  user_id?: number | null;
  /** chat_message：持久化后的消息 ID */
  message_id?: number;
  /** chat_message：消息角色 */
  role?: MessageRole;
}

/** 入站聊天消息帧 */
export interface ChatMessageFrame {
  type: 'chat_message';
  content: string;
  session_id: number | null;
}

/** 入站心跳帧 */
export interface PingFrame {
  type: 'ping';
}

export type InboundFrame = ChatMessageFrame | PingFrame;

/** 入站帧解析结果 */
export type FrameParseResult =
  | { ok: true; frame: InboundFrame }
  | { ok: false; reason: string };

/** 下发给客户端的错误文案 */
export const FRAME_ERRORS = {
  invalidJson: '无效的 JSON 格式',
  invalidFormat: '无效的消息格式',
  emptyContent: '消息内容不能为空',
  invalidSessionId: 'session_id 必须为正整数',
  missingSession: '未指定目标会话',
  sessionUnavailable: '会话不存在或无权访问',
  postForbidden: '当前角色无发言权限',
  internal: '服务器内部错误，请稍后重试',
} as const;

/** 帧外壳：缺省 type 按 chat_message 处理 */
const FrameEnvelopeSchema = z.object({
  type: z.string().default('chat_message'),
});

const ChatMessageFrameSchema = z.object({
  type: z.literal('chat_message').default('chat_message'),
  content: z
    .string({ required_error: FRAME_ERRORS.emptyContent, invalid_type_error: FRAME_ERRORS.invalidFormat })
    .trim()
    .min(1, FRAME_ERRORS.emptyContent),
  session_id: z
    .number({ invalid_type_error: FRAME_ERRORS.invalidSessionId })
    .int(FRAME_ERRORS.invalidSessionId)
    .positive(FRAME_ERRORS.invalidSessionId)
    .nullable()
    .default(null),
});

/**
 * 解析一条入站文本帧
 */
export function parseInboundFrame(raw: string): FrameParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, reason: FRAME_ERRORS.invalidJson };
  }

  const envelope = FrameEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return { ok: false, reason: FRAME_ERRORS.invalidFormat };
  }

  switch (envelope.data.type) {
    case 'chat_message': {
      const parsed = ChatMessageFrameSchema.safeParse(data);
      if (!parsed.success) {
        return { ok: false, reason: parsed.error.issues[0]?.message ?? FRAME_ERRORS.invalidFormat };
      }
      return { ok: true, frame: parsed.data };
    }
    case 'ping':
      return { ok: true, frame: { type: 'ping' } };
    default:
      return { ok: false, reason: `不支持的消息类型: ${envelope.data.type}` };
  }
}

/** 毫秒时间戳转 ISO-8601 */
export function toIsoTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}

/**
 * 构建下发帧（非 chat_message）
 */
export function buildFrame(
  type: Exclude<ServerFrameType, 'chat_message'>,
  content: string,
  sessionId: number | null = null,
  now: number = Date.now(),
): ServerFrame {
  return {
    type,
    content,
    session_id: sessionId,
    timestamp: toIsoTimestamp(now),
  };
}

/**
 * 由已持久化消息构建 chat_message 帧
 */
export function buildMessageFrame(message: StoredMessage): ServerFrame {
  return {
    type: 'chat_message',
    content: message.content,
    session_id: message.sessionId,
    timestamp: toIsoTimestamp(message.createdAt),
    user_id: message.authorId,
    message_id: message.id,
    role: message.role,
  };
}

/** 序列化下发帧 */
export function encodeFrame(frame: ServerFrame): string {
  return JSON.stringify(frame);
}
