import {
  createParamDecorator,
  ExecutionContext,
  InternalServerErrorException,
} from '@nestjs/common';
import { User } from '../../database/entities/user.entity';
import { AuthenticatedRequest } from '../types/request.type';

/**
 * The user resolved by JwtAuthGuard. Only valid on routes the guard
 * protects; on a @Public() route there is no user to inject.
 */
export const CurrentUser = createParamDecorator(
  (data: keyof User | undefined, ctx: ExecutionContext): User | User[keyof User] => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    const user = request.user;

    if (!user) {
      throw new InternalServerErrorException('No authenticated user on request');
    }

    return data ? user[data] : user;
  },
);
