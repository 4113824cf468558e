/**
 * 存储层统一导出
 */

export type {
  StorageProvider,
  CreatedSession,
  AdmitParticipantInput,
  MessagePage,
} from './storage-provider.js';

export { SqliteStorageProvider, DEFAULT_MAX_PARTICIPANTS } from './sqlite-provider.js';
export type { SqliteStorageConfig } from './sqlite-provider.js';
