import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { I18nService } from 'nestjs-i18n';
import { ExtractJwt } from 'passport-jwt';
import { AppCacheService } from '../../../cache/cache.service';
import { IS_PUBLIC_KEY } from '../../../common/decorators/public.decorator';
import { AuthenticatedRequest } from '../../../common/types/request.type';
import { SessionResolverService } from '../session-resolver.service';

const extractBearer = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * Global guard: every route requires a verified user unless marked @Public().
 * Unverified accounts get their own 401 message.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly resolver: SessionResolverService,
    private readonly cache: AppCacheService,
    private readonly i18n: I18nService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const token = extractBearer(request);
    if (!token) {
      throw new UnauthorizedException(
        this.i18n.translate('auth.errors.invalidCredentials'),
      );
    }

    const user = await this.resolver.resolve(token, this.cache.port());

    if (!user.isVerified) {
      throw new UnauthorizedException(
        this.i18n.translate('auth.errors.emailNotVerified'),
      );
    }

    request.user = user;
    return true;
  }
}
