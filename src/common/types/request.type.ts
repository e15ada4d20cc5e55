import { Request } from 'express';
import { User } from '../../database/entities/user.entity';

/** Set by JwtAuthGuard on every non-public route. */
export interface AuthenticatedRequest extends Request {
  user?: User;
}
