import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Query,
} from '@nestjs/common';
import { Public } from '../../common/decorators/public.decorator';
import { UserRead } from '../users/types/user.type';
import { AuthService } from './auth.service';
import {
  EmailDto,
  LoginDto,
  RegisterDto,
  ResetPasswordDto,
  TokenQueryDto,
} from './dto/auth.dto';
import { MessageResponse, TokenResponse } from './types/auth.type';

/**
 * Public authentication flows:
 *
 *  Registration & email verification
 *  ├─ POST   /auth/register
 *  ├─ GET    /auth/verify?token=            ← link from the verification email
 *  └─ POST   /auth/resend-verification
 *
 *  Login
 *  └─ POST   /auth/login
 *
 *  Password reset
 *  ├─ POST   /auth/request-password-reset   ← step 1 – mail a reset link
 *  ├─ GET    /auth/reset-password?token=    ← step 2 – check the link
 *  └─ POST   /auth/reset-password           ← step 3 – set new password
 */
@Public()
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  // ──────────────────────────────────────────────────────────────────────────
  // REGISTRATION
  // ──────────────────────────────────────────────────────────────────────────

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  register(@Body() dto: RegisterDto): Promise<UserRead> {
    return this.authService.register(dto);
  }

  @Get('verify')
  verifyEmail(@Query() query: TokenQueryDto): Promise<MessageResponse> {
    return this.authService.verifyEmail(query.token);
  }

  /** Same reply whether or not the address is registered. */
  @Post('resend-verification')
  @HttpCode(HttpStatus.OK)
  resendVerification(@Body() dto: EmailDto): Promise<MessageResponse> {
    return this.authService.resendVerification(dto.email);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // LOGIN
  // ──────────────────────────────────────────────────────────────────────────

  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto): Promise<TokenResponse> {
    return this.authService.login(dto);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // PASSWORD RESET
  // ──────────────────────────────────────────────────────────────────────────

  /** Always 202, so the reply cannot be used to discover which accounts exist. */
  @Post('request-password-reset')
  @HttpCode(HttpStatus.ACCEPTED)
  requestPasswordReset(@Body() dto: EmailDto): Promise<MessageResponse> {
    return this.authService.requestPasswordReset(dto.email);
  }

  @Get('reset-password')
  checkResetToken(@Query() query: TokenQueryDto): Promise<MessageResponse> {
    return this.authService.checkResetToken(query.token);
  }

  @Post('reset-password')
  @HttpCode(HttpStatus.OK)
  resetPassword(@Body() dto: ResetPasswordDto): Promise<MessageResponse> {
    return this.authService.resetPassword(dto);
  }
}
