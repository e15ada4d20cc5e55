import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { AUTH_CONSTANTS } from '../../common/constants/auth.constants';
import { MailModule } from '../mail/mail.module';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';
import { CredentialsService } from './credentials.service';
import { PasswordResetService } from './password-reset.service';
import { SessionResolverService } from './session-resolver.service';

@Module({
  imports: [
    // No default expiry: reset tokens are signed without `exp` and
    // the other token kinds pass their own.
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        secret: config.getOrThrow<string>('jwt.secret'),
        signOptions: { algorithm: AUTH_CONSTANTS.TOKEN_ALGORITHM },
      }),
    }),
    MailModule,
    UsersModule,
  ],
  controllers: [AuthController],
  providers: [
    AuthService,
    CredentialsService,
    PasswordResetService,
    SessionResolverService,
  ],
  exports: [CredentialsService, PasswordResetService, SessionResolverService],
})
export class AuthModule {}
