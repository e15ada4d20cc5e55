import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { CachePort } from '../../cache/cache.port';
import {
  AUTH_CONSTANTS,
  CACHE_KEYS,
} from '../../common/constants/auth.constants';
import { ResetTokenClaims, ResetTokenPayload } from '../../common/types/jwt.type';

export interface IssuedResetToken {
  token: string;
  jti: string;
}

/**
 * Single-use password-reset tokens.
 *
 * Lifecycle per token: issued → valid → consumed | expired | invalidated.
 * The token is an HS512 JWT under `passwordReset.secret` carrying a fresh
 * `jti`; age is measured from `iat` against the reset window. Single use is
 * enforced by the `reset:{jti}` cache record, which must still exist at
 * validation time and is deleted on consumption.
 *
 * With no cache the signature and age are the only checks, so a token stays
 * reusable until it ages out.
 */
@Injectable()
export class PasswordResetService {
  private readonly logger = new Logger(PasswordResetService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
  ) {}

  /**
   * Signs a token for `userId` and records its jti.
   * A failed record write is logged; the token is returned regardless.
   */
  async create(
    cache: CachePort | null,
    userId: number,
    email: string,
  ): Promise<IssuedResetToken> {
    const jti = randomUUID();
    const payload: ResetTokenPayload = { sub: String(userId), email, jti };
    const token = this.jwtService.sign(payload, {
      secret: this.secret(),
      algorithm: AUTH_CONSTANTS.RESET_TOKEN_ALGORITHM,
    });

    if (!cache) {
      this.logger.warn(
        `No cache configured; reset token ${jti} cannot be enforced as single-use`,
      );
    } else {
      const stored = await cache.setJson(
        CACHE_KEYS.PASSWORD_RESET(jti),
        { userId, email, used: false },
        this.windowSeconds(),
      );
      if (!stored) {
        this.logger.warn(`Could not record reset token ${jti}`);
      }
    }

    this.logger.log(`Created password reset token for user ${userId}`);
    return { token, jti };
  }

  /** Resolves `null` for a token that is forged, too old, malformed or already consumed. */
  async validate(
    cache: CachePort | null,
    token: string,
  ): Promise<ResetTokenClaims | null> {
    let payload: Record<string, unknown>;
    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        secret: this.secret(),
        algorithms: [AUTH_CONSTANTS.RESET_TOKEN_ALGORITHM],
        maxAge: this.windowSeconds(),
      });
    } catch (error) {
      this.logger.warn(
        `Invalid or expired password reset token: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }

    const { sub, email, jti, iat } = payload;
    if (typeof jti !== 'string' || jti.length === 0) {
      this.logger.warn('Password reset token missing jti');
      return null;
    }
    if (
      typeof sub !== 'string' ||
      !/^[1-9]\d*$/.test(sub) ||
      typeof email !== 'string' ||
      typeof iat !== 'number'
    ) {
      this.logger.warn(`Password reset token ${jti} has malformed claims`);
      return null;
    }

    if (cache && !(await cache.exists(CACHE_KEYS.PASSWORD_RESET(jti)))) {
      this.logger.warn(`Password reset token ${jti} not found or already used`);
      return null;
    }

    return {
      userId: Number(sub),
      email,
      jti,
      issuedAt: new Date(iat * 1000),
    };
  }

  /**
   * Claims the jti of a validated token by deleting its record. Only one
   * caller can win the claim; a lost claim means the token was consumed
   * meanwhile. Without a cache there is nothing to claim and this resolves
   * `true`.
   */
  async consume(cache: CachePort | null, jti: string): Promise<boolean> {
    if (!cache) return true;

    const claimed = await cache.take(CACHE_KEYS.PASSWORD_RESET(jti));
    if (claimed) {
      this.logger.log(`Consumed password reset token ${jti}`);
    } else {
      this.logger.warn(`Password reset token ${jti} was already consumed`);
    }
    return claimed;
  }

  /** Idempotent; `false` only when there is no cache or the delete failed. */
  async invalidate(cache: CachePort | null, jti: string): Promise<boolean> {
    const result = cache
      ? await cache.delete(CACHE_KEYS.PASSWORD_RESET(jti))
      : false;

    if (result) {
      this.logger.log(`Invalidated password reset token ${jti}`);
    } else {
      this.logger.warn(`Failed to invalidate password reset token ${jti}`);
    }
    return result;
  }

  windowSeconds(): number {
    return this.config.get<number>('passwordReset.expiresIn', 1800);
  }

  private secret(): string {
    return this.config.getOrThrow<string>('passwordReset.secret');
  }
}
