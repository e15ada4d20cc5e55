import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheDriver } from '../common/types/config.type';
import { CachePort } from './cache.port';

interface CacheEntry {
  /** Serialised JSON, so callers never share references with the store. */
  data: string;
  expiresAt: number;
  lastAccessedAt: number;
}

/**
 * Per-process TTL map used in development and tests.
 * Values go through JSON exactly as they would through Redis.
 */
@Injectable()
export class InMemoryCacheService
  implements CachePort, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(InMemoryCacheService.name);
  private readonly cache = new Map<string, CacheEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;
  private readonly maxSize: number;

  constructor(private readonly config: ConfigService) {
    this.maxSize = this.config.get<number>('cache.max', 500);
  }

  onModuleInit(): void {
    if (this.config.get<CacheDriver>('cache.driver') !== 'memory') {
      return;
    }

    const cleanupIntervalMs = this.config.get<number>(
      'cache.cleanupInterval',
      5 * 60 * 1000,
    );

    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, cleanupIntervalMs);
    this.cleanupInterval.unref();

    this.logger.log(
      `In-memory cache initialized (max: ${this.maxSize}, cleanup: ${cleanupIntervalMs}ms)`,
    );
  }

  onModuleDestroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }

  async getJson<T = unknown>(key: string): Promise<T | null> {
    const entry = this.live(key);
    if (!entry) return null;

    entry.lastAccessedAt = Date.now();

    try {
      return JSON.parse(entry.data) as T;
    } catch (error) {
      this.logger.warn(
        `Invalid JSON in cache for key "${key}": ${error instanceof Error ? error.message : String(error)}`,
      );
      this.cache.delete(key);
      return null;
    }
  }

  async setJson(key: string, value: unknown, ttlSeconds: number): Promise<boolean> {
    let serialized: string;
    try {
      serialized = JSON.stringify(value);
    } catch (error) {
      this.logger.warn(
        `Cannot serialise value for key "${key}": ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }

    if (this.cache.size >= this.maxSize && !this.cache.has(key)) {
      this.evictLRU();
    }

    const now = Date.now();
    this.cache.set(key, {
      data: serialized,
      expiresAt: ttlSeconds > 0 ? now + ttlSeconds * 1000 : Infinity,
      lastAccessedAt: now,
    });
    return true;
  }

  async delete(key: string): Promise<boolean> {
    this.cache.delete(key);
    return true;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== null;
  }

  async take(key: string): Promise<boolean> {
    const entry = this.live(key);
    return entry !== null && this.cache.delete(key);
  }

  size(): number {
    return this.cache.size;
  }

  private live(key: string): CacheEntry | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry;
  }

  private cleanup(): void {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      this.logger.debug(
        `Cleaned up ${cleanedCount} expired entries (${this.cache.size} remaining)`,
      );
    }
  }

  private evictLRU(): void {
    let oldestKey: string | null = null;
    let oldestTime = Infinity;

    for (const [key, entry] of this.cache.entries()) {
      if (entry.lastAccessedAt < oldestTime) {
        oldestTime = entry.lastAccessedAt;
        oldestKey = key;
      }
    }

    if (oldestKey) {
      this.cache.delete(oldestKey);
      this.logger.debug(`Evicted LRU entry: ${oldestKey}`);
    }
  }
}
