/**
 * 类型定义统一导出
 */

export type {
  SessionKind,
  ParticipantRole,
  MessageRole,
  UserIdentity,
  ChatSession,
  SessionOverview,
  Participant,
  StoredMessage,
  ConversationTurn,
  NewSessionInput,
  SessionPatch,
  NewMessageInput,
} from './chat.js';

export {
  SESSION_KINDS,
  PARTICIPANT_ROLES,
  MESSAGE_ROLES,
} from './chat.js';

export type {
  ServerFrameType,
  ServerFrame,
  ChatMessageFrame,
  PingFrame,
  InboundFrame,
  FrameParseResult,
} from './frame.js';

export {
  FRAME_ERRORS,
  parseInboundFrame,
  buildFrame,
  buildMessageFrame,
  encodeFrame,
  toIsoTimestamp,
} from './frame.js';

export {
  ConfigSchema,
} from './config.js';

export type {
  Config,
  ServerConfig,
  AuthConfig,
  StorageConfig,
  ResponderConfig,
} from './config.js';
