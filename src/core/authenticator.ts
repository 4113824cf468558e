/**
 * 连接认证
 *
 * 校验 Bearer JWT，并确认对应用户存在且处于启用状态。
 * 认证失败统一返回 null，具体原因只写日志。
 */

import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { UserIdentity } from '../types/chat.js';
import type { StorageProvider } from '../storage/storage-provider.js';
import type { AuthConfig } from '../types/config.js';
import { AuthError } from './errors.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('Authenticator');

/** 认证器接口 */
export interface Authenticator {
  /** token 有效且用户启用时返回用户身份，否则返回 null */
  authenticate(token: string | undefined): Promise<UserIdentity | null>;
}

/** token 载荷：签发时写入 user_id，也接受数字形式的 sub */
const TokenPayloadSchema = z.union([
  z.object({ user_id: z.number().int().positive() }),
  z.object({ sub: z.coerce.number().int().positive() }),
]);

function payloadUserId(payload: z.infer<typeof TokenPayloadSchema>): number {
  return 'user_id' in payload ? payload.user_id : payload.sub;
}

/**
 * 基于 JWT 的认证器
 */
export class JwtAuthenticator implements Authenticator {
  private readonly secret: string;
  private readonly algorithms: jwt.Algorithm[];
  private readonly tokenTtlSeconds: number;

  constructor(
    private readonly store: StorageProvider,
    config: AuthConfig,
  ) {
    this.secret = config.jwtSecret;
    this.algorithms = config.algorithms;
    this.tokenTtlSeconds = config.tokenTtlSeconds;
  }

  async authenticate(token: string | undefined): Promise<UserIdentity | null> {
    if (!token) {
      log.debug('缺少认证 token');
      return null;
    }

    let userId: number;
    try {
      userId = this.verify(token);
    } catch (err) {
      log.debug({ reason: err instanceof Error ? err.message : String(err) }, 'token 校验失败');
      return null;
    }

    const user = await this.store.getUser(userId);
    if (!user?.isActive) {
      log.debug({ userId }, '用户不存在或已停用');
      return null;
    }
    return user;
  }

  /**
   * 为用户签发访问 token
   */
  issueToken(userId: number): string {
    return jwt.sign({ user_id: userId, type: 'access' }, this.secret, {
      algorithm: this.algorithms[0] ?? 'HS256',
      expiresIn: this.tokenTtlSeconds,
    });
  }

  /** 校验签名与有效期，返回 token 中的用户 ID */
  private verify(token: string): number {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: this.algorithms });
    } catch (err) {
      if (err instanceof jwt.TokenExpiredError) {
        throw new AuthError('token 已过期', { expiredAt: err.expiredAt }, { cause: err });
      }
      throw new AuthError('token 无效', undefined, { cause: err });
    }

    const payload = TokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw new AuthError('token 载荷缺少用户 ID');
    }
    return payloadUserId(payload.data);
  }
}
