import { plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsString,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { UserRole } from '../../database/enums/user-role.enum';
import { UserRead } from './types/user.type';

export const toUserRead = (user: UserRead): UserRead => ({
  id: user.id,
  email: user.email,
  fullName: user.fullName,
  avatarUrl: user.avatarUrl,
  isActive: user.isActive,
  isVerified: user.isVerified,
  role: user.role,
});

/**
 * Schema of the `user:{id}` cache entry. Anything read back from the cache
 * passes through here before it is trusted.
 */
class UserSnapshot implements UserRead {
  @IsInt()
  @Min(1)
  id!: number;

  @IsString()
  email!: string;

  @ValidateIf((snapshot: UserSnapshot) => snapshot.fullName !== null)
  @IsString()
  fullName!: string | null;

  @ValidateIf((snapshot: UserSnapshot) => snapshot.avatarUrl !== null)
  @IsString()
  avatarUrl!: string | null;

  @IsBoolean()
  isActive!: boolean;

  @IsBoolean()
  isVerified!: boolean;

  @IsEnum(UserRole)
  role!: UserRole;
}

/** Returns the snapshot when `value` matches the schema, `null` otherwise. */
export const parseUserSnapshot = (value: unknown): UserRead | null => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }

  const snapshot = plainToInstance(UserSnapshot, value);
  const errors = validateSync(snapshot, { forbidUnknownValues: true });
  return errors.length === 0 ? toUserRead(snapshot) : null;
};
