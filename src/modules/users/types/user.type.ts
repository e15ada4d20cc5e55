import { User } from '../../../database/entities/user.entity';
import { UserRole } from '../../../database/enums/user-role.enum';

/** Public projection of a user; also the shape of the cached profile snapshot. */
export interface UserRead {
  id: number;
  email: string;
  fullName: string | null;
  avatarUrl: string | null;
  isActive: boolean;
  isVerified: boolean;
  role: UserRole;
}

/** Columns whose mutation must drop the cached snapshot. */
export type UserUpdate = Partial<
  Pick<User, 'isVerified' | 'passwordHash' | 'avatarUrl' | 'isActive' | 'role'>
>;

export interface NewUser {
  email: string;
  passwordHash: string;
  fullName: string | null;
}
