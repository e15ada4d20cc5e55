import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { I18nService } from 'nestjs-i18n';
import { AppCacheService } from '../../cache/cache.service';
import { isUniqueViolation } from '../../database/database.errors';
import { User } from '../../database/entities/user.entity';
import { MailService } from '../mail/mail.service';
import { UserRead } from '../users/types/user.type';
import { toUserRead } from '../users/user.mapper';
import { UsersService } from '../users/users.service';
import { CredentialsService } from './credentials.service';
import { LoginDto, RegisterDto, ResetPasswordDto } from './dto/auth.dto';
import { PasswordResetService } from './password-reset.service';
import { MessageResponse, TokenResponse } from './types/auth.type';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly i18n: I18nService,
    private readonly config: ConfigService,
    private readonly users: UsersService,
    private readonly credentials: CredentialsService,
    private readonly passwordReset: PasswordResetService,
    private readonly mailService: MailService,
    private readonly cache: AppCacheService,
  ) {}

  // ============================================================================
  // REGISTRATION
  // ============================================================================

  /**
   * Creates an unverified account and mails a verification link.
   *
   * Steps:
   *  1. Reject an email that is already registered.
   *  2. Persist the user with an argon2id hash. A unique violation raised by
   *     a concurrent registration is reported the same way as step 1.
   *  3. Issue an email-verification token and send the link in the
   *     background.
   *
   * @throws ConflictException Email already registered.
   */
  async register(dto: RegisterDto): Promise<UserRead> {
    if (await this.users.existsByEmail(dto.email)) {
      throw this.emailTaken();
    }

    let user: User;
    try {
      user = await this.users.create({
        email: dto.email,
        passwordHash: await this.credentials.hashPassword(dto.password),
        fullName: dto.fullName ?? null,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw this.emailTaken();
      }
      throw error;
    }

    this.logger.log(`Registered user ${user.id}`);
    this.sendVerification(user.email);

    return toUserRead(user);
  }

  // ============================================================================
  // EMAIL VERIFICATION
  // ============================================================================

  /**
   * Marks the account named by a verification token as verified.
   *
   * @throws BadRequestException Token invalid or expired, or its email is unknown.
   */
  async verifyEmail(token: string): Promise<MessageResponse> {
    const email = this.credentials.verifyEmailVerificationToken(token);
    const user = email ? await this.users.findByEmail(email) : null;

    if (!user) {
      throw this.invalidToken();
    }

    await this.users.markVerified(user.id);
    this.logger.log(`Email verified for user ${user.id}`);

    return { message: this.i18n.translate('auth.messages.emailVerified') };
  }

  /**
   * Re-sends the verification link. The reply never reveals whether the
   * address exists or is already verified.
   */
  async resendVerification(email: string): Promise<MessageResponse> {
    const user = await this.users.findByEmail(email);

    if (user && !user.isVerified) {
      this.sendVerification(user.email);
    }

    return { message: this.i18n.translate('auth.messages.verificationSent') };
  }

  // ============================================================================
  // LOGIN
  // ============================================================================

  /**
   * @throws UnauthorizedException Wrong credentials, unverified email or
   *   inactive account, each with its own message.
   */
  async login(dto: LoginDto): Promise<TokenResponse> {
    const user = await this.users.findByEmail(dto.email);

    const passwordValid = user
      ? await this.credentials.verifyPassword(dto.password, user.passwordHash)
      : false;

    if (!user || !passwordValid) {
      throw new UnauthorizedException(
        this.i18n.translate('auth.errors.invalidCredentials'),
      );
    }

    if (!user.isVerified) {
      throw new UnauthorizedException(
        this.i18n.translate('auth.errors.emailNotVerified'),
      );
    }

    if (!user.isActive) {
      throw new UnauthorizedException(
        this.i18n.translate('auth.errors.accountInactive'),
      );
    }

    return {
      accessToken: this.credentials.issueAccessToken({
        userId: user.id,
        email: user.email,
      }),
      tokenType: 'bearer',
    };
  }

  // ============================================================================
  // PASSWORD RESET
  // ============================================================================

  /**
   * Issues a single-use reset token and mails it. Unknown addresses get the
   * same reply and no mail.
   */
  async requestPasswordReset(email: string): Promise<MessageResponse> {
    const user = await this.users.findByEmail(email);

    if (user) {
      const { token } = await this.passwordReset.create(
        this.cache.port(),
        user.id,
        user.email,
      );
      const resetUrl = `${this.publicUrl()}/api/auth/reset-password?token=${encodeURIComponent(token)}`;

      void this.mailService
        .sendPasswordResetEmail(user.email, resetUrl)
        .catch((error: unknown) => this.logMailFailure('password reset', error));
    }

    return { message: this.i18n.translate('auth.messages.resetRequested') };
  }

  /** @throws BadRequestException Token invalid, expired or already used. */
  async checkResetToken(token: string): Promise<MessageResponse> {
    const claims = await this.passwordReset.validate(this.cache.port(), token);
    if (!claims) {
      throw this.invalidToken();
    }

    return { message: this.i18n.translate('auth.messages.resetTokenValid') };
  }

  /**
   * Consumes a reset token and sets the new password.
   *
   * Steps:
   *  1. Validate the token (signature, age, jti still recorded).
   *  2. Claim the jti by deleting its record; a request that loses the
   *     claim to a concurrent one is rejected.
   *  3. Load the user it names.
   *  4. Store the new hash; this also drops the cached profile.
   *
   * @throws BadRequestException Token invalid, expired, consumed, or the user is gone.
   */
  async resetPassword(dto: ResetPasswordDto): Promise<MessageResponse> {
    const cache = this.cache.port();
    const claims = await this.passwordReset.validate(cache, dto.token);
    if (!claims) {
      throw this.invalidToken();
    }

    if (!(await this.passwordReset.consume(cache, claims.jti))) {
      throw this.invalidToken();
    }

    const user = await this.users.findById(claims.userId);
    if (!user) {
      throw this.invalidToken();
    }

    await this.users.updatePassword(
      user.id,
      await this.credentials.hashPassword(dto.newPassword),
    );
    this.logger.log(`Password reset completed for user ${user.id}`);

    return { message: this.i18n.translate('auth.messages.passwordReset') };
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private sendVerification(email: string): void {
    const token = this.credentials.issueEmailVerificationToken(email);
    const verifyUrl = `${this.publicUrl()}/api/auth/verify?token=${encodeURIComponent(token)}`;

    void this.mailService
      .sendVerificationEmail(email, verifyUrl)
      .catch((error: unknown) => this.logMailFailure('verification', error));
  }

  private logMailFailure(kind: string, error: unknown): void {
    this.logger.warn(
      `${kind} email not delivered: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  private publicUrl(): string {
    return this.config.get<string>('app.publicUrl', 'http://localhost:3000');
  }

  private emailTaken(): ConflictException {
    return new ConflictException(
      this.i18n.translate('auth.errors.emailAlreadyExists'),
    );
  }

  private invalidToken(): BadRequestException {
    return new BadRequestException(
      this.i18n.translate('auth.errors.invalidOrExpiredToken'),
    );
  }
}
