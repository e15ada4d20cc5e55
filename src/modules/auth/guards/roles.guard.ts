import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { I18nService } from 'nestjs-i18n';
import { ROLES_KEY } from '../../../common/decorators/roles.decorator';
import { AuthenticatedRequest } from '../../../common/types/request.type';
import { UserRole } from '../../../database/enums/user-role.enum';

/** Runs after JwtAuthGuard; routes without @Roles() are open to any verified user. */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly i18n: I18nService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<UserRole[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const user = context.switchToHttp().getRequest<AuthenticatedRequest>().user;

    if (!user || !requiredRoles.includes(user.role)) {
      throw new ForbiddenException(
        this.i18n.translate('auth.errors.insufficientPermissions'),
      );
    }

    return true;
  }
}
