import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { I18nService } from 'nestjs-i18n';
import { AppCacheService } from '../../cache/cache.service';
import { CACHE_KEYS } from '../../common/constants/auth.constants';
import { User } from '../../database/entities/user.entity';
import { UserRole } from '../../database/enums/user-role.enum';
import { NewUser, UserUpdate } from './types/user.type';
import { UsersRepository } from './users.repository';

/**
 * Owns every write to a user row.
 *
 * Each mutation of a field carried by the profile snapshot deletes
 * `user:{id}` before it resolves, so the next authenticated request reads
 * the store again.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    private readonly users: UsersRepository,
    private readonly cache: AppCacheService,
    private readonly i18n: I18nService,
  ) {}

  findById(id: number): Promise<User | null> {
    return this.users.findById(id);
  }

  findByEmail(email: string): Promise<User | null> {
    return this.users.findByEmail(email);
  }

  existsByEmail(email: string): Promise<boolean> {
    return this.users.existsByEmail(email);
  }

  create(data: NewUser): Promise<User> {
    return this.users.create(data);
  }

  // ============================================================================
  // MUTATIONS
  // ============================================================================

  markVerified(id: number): Promise<User | null> {
    return this.update(id, { isVerified: true });
  }

  updatePassword(id: number, passwordHash: string): Promise<User | null> {
    return this.update(id, { passwordHash });
  }

  updateAvatar(id: number, avatarUrl: string): Promise<User | null> {
    return this.update(id, { avatarUrl });
  }

  /** @throws NotFoundException No user has `id`. */
  async updateRole(id: number, role: UserRole): Promise<User> {
    const user = await this.update(id, { role });
    if (!user) {
      throw new NotFoundException(this.i18n.translate('users.errors.notFound'));
    }
    this.logger.log(`Role of user ${id} set to ${role}`);
    return user;
  }

  /** @throws NotFoundException No user has `id`. */
  async updateStatus(id: number, isActive: boolean): Promise<User> {
    const user = await this.update(id, { isActive });
    if (!user) {
      throw new NotFoundException(this.i18n.translate('users.errors.notFound'));
    }
    this.logger.log(`User ${id} ${isActive ? 'activated' : 'deactivated'}`);
    return user;
  }

  private async update(id: number, changes: UserUpdate): Promise<User | null> {
    const user = await this.users.update(id, changes);
    await this.invalidate(id);
    return user;
  }

  private async invalidate(id: number): Promise<void> {
    const cache = this.cache.port();
    if (!cache) return;

    const deleted = await cache.delete(CACHE_KEYS.USER_PROFILE(id));
    if (!deleted) {
      this.logger.warn(`Could not invalidate cached profile of user ${id}`);
    }
  }
}
