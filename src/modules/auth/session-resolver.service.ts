import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { I18nService } from 'nestjs-i18n';
import { CachePort } from '../../cache/cache.port';
import { AppCacheService } from '../../cache/cache.service';
import { CACHE_KEYS } from '../../common/constants/auth.constants';
import { User } from '../../database/entities/user.entity';
import { parseUserSnapshot, toUserRead } from '../users/user.mapper';
import { UsersRepository } from '../users/users.repository';
import { CredentialsService } from './credentials.service';

/**
 * Turns a bearer token into the authenticated user.
 *
 * The profile cache only short-circuits rejection of inactive accounts;
 * the returned user always comes from the store. Cache faults are logged
 * and fall through to the store lookup.
 */
@Injectable()
export class SessionResolverService {
  private readonly logger = new Logger(SessionResolverService.name);

  constructor(
    private readonly credentials: CredentialsService,
    private readonly users: UsersRepository,
    private readonly i18n: I18nService,
    private readonly appCache: AppCacheService,
  ) {}

  /**
   * Steps:
   *  1. Decode the access token.
   *  2. Parse `sub` as a positive integer user id.
   *  3. With a cache, consult `user:{id}`: an inactive snapshot rejects at
   *     once, a valid one still loads the user from the store, a malformed
   *     one is dropped.
   *  4. Otherwise load from the store, reject absent or inactive users and
   *     write a fresh snapshot.
   *
   * @throws UnauthorizedException Token invalid, user absent or inactive.
   */
  async resolve(token: string, cache: CachePort | null): Promise<User> {
    const claims = this.credentials.decodeAccessToken(token);
    if (!claims || !/^[1-9]\d*$/.test(claims.subject)) {
      throw this.invalidCredentials();
    }
    const userId = Number(claims.subject);
    const cacheKey = CACHE_KEYS.USER_PROFILE(userId);

    if (cache) {
      const hit = await this.fromCache(cache, cacheKey, userId);
      if (hit) return hit;
    }

    const user = await this.users.findById(userId);
    if (!user) {
      throw this.invalidCredentials();
    }
    if (!user.isActive) {
      throw this.inactive();
    }

    if (cache) {
      const stored = await cache.setJson(
        cacheKey,
        toUserRead(user),
        this.appCache.userTtl(),
      );
      if (stored) {
        this.logger.debug(`Cached user ${userId}`);
      }
    }

    return user;
  }

  /** `null` means fall through to the miss path. */
  private async fromCache(
    cache: CachePort,
    cacheKey: string,
    userId: number,
  ): Promise<User | null> {
    const cached = await cache.getJson(cacheKey);
    if (cached === null) return null;

    const snapshot = parseUserSnapshot(cached);
    if (!snapshot || snapshot.id !== userId) {
      this.logger.warn(`Invalid cache data for user ${userId}`);
      await cache.delete(cacheKey);
      return null;
    }

    this.logger.debug(`Cache hit for user ${userId}`);
    if (!snapshot.isActive) {
      throw this.inactive();
    }

    const user = await this.users.findById(userId);
    if (!user) {
      await cache.delete(cacheKey);
      throw this.invalidCredentials();
    }
    if (!user.isActive) {
      await cache.delete(cacheKey);
      throw this.inactive();
    }
    return user;
  }

  private invalidCredentials(): UnauthorizedException {
    return new UnauthorizedException(
      this.i18n.translate('auth.errors.invalidCredentials'),
    );
  }

  private inactive(): UnauthorizedException {
    return new UnauthorizedException(
      this.i18n.translate('auth.errors.accountInactive'),
    );
  }
}
