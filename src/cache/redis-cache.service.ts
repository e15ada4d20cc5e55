import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import { CacheDriver } from '../common/types/config.type';
import { CachePort } from './cache.port';

@Injectable()
export class RedisCacheService
  implements CachePort, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(RedisCacheService.name);
  private redis: Redis | null = null;
  private _isConnected = false;
  private reconnectAttempts = 0;
  private readonly maxReconnectAttempts = 10;

  constructor(private readonly config: ConfigService) {}

  async onModuleInit(): Promise<void> {
    if (this.config.get<CacheDriver>('cache.driver') !== 'redis') {
      return;
    }

    const redisUrl = this.config.get<string | null>('cache.redis.url');
    if (!redisUrl) {
      this.logger.warn(
        'REDIS_URL not configured. Profile cache will behave as always-miss.',
      );
      return;
    }

    const options: RedisOptions = {
      retryStrategy: (times: number): number | null => {
        if (times > this.maxReconnectAttempts) {
          this.logger.error(
            `Max reconnect attempts (${this.maxReconnectAttempts}) reached. Giving up.`,
          );
          return null;
        }
        const delay = Math.min(times * 100, 3000);
        this.logger.warn(
          `Retrying Redis connection in ${delay}ms (attempt ${times})`,
        );
        return delay;
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      lazyConnect: false,
      keepAlive: 30000,
      connectTimeout: 10000,
      commandTimeout: 5000,
    };

    try {
      this.redis = new Redis(redisUrl, options);

      this.redis.on('connect', () => {
        this.reconnectAttempts = 0;
        this.logger.log('Redis connecting...');
      });

      this.redis.on('ready', () => {
        this._isConnected = true;
        this.logger.log('Redis ready');
      });

      this.redis.on('error', (error: Error) => {
        this.logger.error(`Redis connection error: ${error.message}`);
        this._isConnected = false;
      });

      this.redis.on('close', () => {
        this._isConnected = false;
        this.logger.warn('Redis connection closed');
      });

      this.redis.on('reconnecting', (delay: number) => {
        this.reconnectAttempts++;
        this.logger.log(
          `Redis reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`,
        );
      });

      await this.redis.ping();
      this._isConnected = true;
      this.logger.log('Redis ping successful');
    } catch (error) {
      // The client keeps retrying in the background; until then every
      // operation below degrades to a miss.
      this.logger.error(
        `Failed to reach Redis at startup: ${this.describe(error)}`,
      );
      this._isConnected = false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.redis) return;

    try {
      await this.redis.quit();
      this.logger.log('Redis connection gracefully closed');
    } catch (error) {
      this.logger.error(
        `Error closing Redis connection: ${this.describe(error)}`,
      );
      this.redis.disconnect();
    } finally {
      this._isConnected = false;
      this.redis = null;
    }
  }

  async getJson<T = unknown>(key: string): Promise<T | null> {
    const client = this.client();
    if (!client) {
      this.logger.debug(`Redis not available for GET: ${key}`);
      return null;
    }

    let raw: string | null;
    try {
      raw = await client.get(key);
    } catch (error) {
      this.logger.warn(`Redis error getting key "${key}": ${this.describe(error)}`);
      return null;
    }

    if (raw === null) return null;

    try {
      return JSON.parse(raw) as T;
    } catch (error) {
      this.logger.warn(`Invalid JSON in cache for key "${key}": ${this.describe(error)}`);
      await this.delete(key);
      return null;
    }
  }

  async setJson(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    const client = this.client();
    if (!client) {
      this.logger.debug(`Redis not available for SET: ${key}`);
      return false;
    }

    try {
      const serialized = JSON.stringify(value);
      const result =
        ttlSeconds > 0
          ? await client.setex(key, ttlSeconds, serialized)
          : await client.set(key, serialized);
      this.logger.debug(`Cached key ${key} with TTL ${ttlSeconds}s`);
      return result === 'OK';
    } catch (error) {
      this.logger.warn(`Redis error setting key "${key}": ${this.describe(error)}`);
      return false;
    }
  }

  async delete(key: string): Promise<boolean> {
    const client = this.client();
    if (!client) {
      this.logger.debug(`Redis not available for DEL: ${key}`);
      return false;
    }

    try {
      await client.del(key);
      this.logger.debug(`Deleted cache key ${key}`);
      return true;
    } catch (error) {
      this.logger.warn(`Redis error deleting key "${key}": ${this.describe(error)}`);
      return false;
    }
  }

  async exists(key: string): Promise<boolean> {
    const client = this.client();
    if (!client) return false;

    try {
      return (await client.exists(key)) > 0;
    } catch (error) {
      this.logger.warn(`Redis error checking key "${key}": ${this.describe(error)}`);
      return false;
    }
  }

  async take(key: string): Promise<boolean> {
    const client = this.client();
    if (!client) {
      this.logger.debug(`Redis not available for DEL: ${key}`);
      return false;
    }

    try {
      return (await client.del(key)) > 0;
    } catch (error) {
      this.logger.warn(`Redis error taking key "${key}": ${this.describe(error)}`);
      return false;
    }
  }

  isConnected(): boolean {
    return (
      this._isConnected && this.redis !== null && this.redis.status === 'ready'
    );
  }

  private client(): Redis | null {
    return this.isConnected() ? this.redis : null;
  }

  private describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
