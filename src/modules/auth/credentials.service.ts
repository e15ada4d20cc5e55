import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { argon2id, hash, verify } from 'argon2';
import { AUTH_CONSTANTS } from '../../common/constants/auth.constants';
import {
  AccessTokenClaims,
  AccessTokenPayload,
  AccessTokenSubject,
  EmailVerificationPayload,
  TokenType,
} from '../../common/types/jwt.type';

/**
 * Credential codec: password hashing plus access and email-verification
 * tokens. Both token kinds share `jwt.secret`; the `type` claim keeps one
 * from being accepted as the other.
 *
 * Every decode path is total. A bad signature, expired token, wrong
 * algorithm or unexpected claim yields `null`, never an exception.
 */
@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
  ) {}

  // ============================================================================
  // PASSWORDS
  // ============================================================================

  hashPassword(password: string): Promise<string> {
    return hash(password, { type: argon2id });
  }

  /** `false` for a mismatch and for a hash argon2 cannot parse. */
  async verifyPassword(plain: string, passwordHash: string): Promise<boolean> {
    try {
      return await verify(passwordHash, plain);
    } catch (error) {
      this.logger.debug(
        `Password hash rejected: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  // ============================================================================
  // ACCESS TOKENS
  // ============================================================================

  issueAccessToken(subject: AccessTokenSubject, ttlSeconds?: number): string {
    const payload: AccessTokenPayload = {
      sub: String(subject.userId),
      email: subject.email,
      type: TokenType.ACCESS,
    };

    return this.jwtService.sign(payload, {
      secret: this.secret(),
      algorithm: AUTH_CONSTANTS.TOKEN_ALGORITHM,
      expiresIn: ttlSeconds ?? this.config.get<number>('jwt.expiresIn', 1800),
    });
  }

  decodeAccessToken(token: string): AccessTokenClaims | null {
    const payload = this.verifyJwt(token);
    if (!payload || payload.type !== TokenType.ACCESS) return null;

    const { sub, email, iat, exp } = payload;
    if (
      typeof sub !== 'string' ||
      typeof email !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number'
    ) {
      return null;
    }

    return { subject: sub, email, issuedAt: iat, expiresAt: exp };
  }

  // ============================================================================
  // EMAIL VERIFICATION TOKENS
  // ============================================================================

  issueEmailVerificationToken(email: string): string {
    const payload: EmailVerificationPayload = {
      sub: email,
      type: TokenType.EMAIL_VERIFICATION,
    };

    return this.jwtService.sign(payload, {
      secret: this.secret(),
      algorithm: AUTH_CONSTANTS.TOKEN_ALGORITHM,
      expiresIn: this.config.get<number>('jwt.verificationExpiresIn', 86400),
    });
  }

  /** Returns the email the token was issued for. */
  verifyEmailVerificationToken(token: string): string | null {
    const payload = this.verifyJwt(token);
    if (!payload || payload.type !== TokenType.EMAIL_VERIFICATION) return null;

    return typeof payload.sub === 'string' && payload.sub.length > 0
      ? payload.sub
      : null;
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private verifyJwt(token: string): Record<string, unknown> | null {
    try {
      return this.jwtService.verify<Record<string, unknown>>(token, {
        secret: this.secret(),
        algorithms: [AUTH_CONSTANTS.TOKEN_ALGORITHM],
      });
    } catch {
      return null;
    }
  }

  private secret(): string {
    return this.config.getOrThrow<string>('jwt.secret');
  }
}
