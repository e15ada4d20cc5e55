import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheDriver } from '../common/types/config.type';
import { CachePort } from './cache.port';
import { InMemoryCacheService } from './in-memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

/**
 * Selects the profile cache backend from `cache.driver`.
 *
 * Consumers ask for `port()` and receive either a backend or `null`; an
 * absent cache is an ordinary value that the resolver and the reset
 * protocol handle explicitly.
 */
@Injectable()
export class AppCacheService {
  private readonly logger = new Logger(AppCacheService.name);
  private readonly driver: CacheDriver;

  constructor(
    private readonly config: ConfigService,
    private readonly redisCache: RedisCacheService,
    private readonly memoryCache: InMemoryCacheService,
  ) {
    this.driver = this.config.get<CacheDriver>('cache.driver', 'memory');
    this.logger.log(`Cache driver: ${this.driver}`);
  }

  port(): CachePort | null {
    switch (this.driver) {
      case 'redis':
        return this.redisCache;
      case 'memory':
        return this.memoryCache;
      case 'none':
        return null;
    }
  }

  /** TTL in seconds applied to `user:{id}` snapshots. */
  userTtl(): number {
    return this.config.get<number>('cache.userTtl', 900);
  }
}
