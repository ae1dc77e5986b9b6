/**
 * Redis 목록 캐시 어댑터
 * IListingCachePort의 Redis 기반 구현체
 *
 * SETEX 로 TTL 을 걸고, 접두사 무효화는 SCAN 으로 키를 모아 DEL 합니다.
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import type { IListingCachePort } from '../../domain/storage/ports/listing-cache.port';

const SCAN_BATCH = 100;

@Injectable()
export class RedisListingCacheAdapter implements IListingCachePort, OnModuleDestroy {
  private readonly logger = new Logger(RedisListingCacheAdapter.name);
  private readonly redis: Redis;

  constructor(private readonly configService: ConfigService) {
    this.redis = new Redis({
      host: this.configService.get<string>('REDIS_HOST', 'localhost'),
      port: Number(this.configService.get('REDIS_PORT', 6379)),
      password: this.configService.get<string>('REDIS_PASSWORD'),
      // 연결이 끊기면 명령을 쌓아두지 않고 바로 실패
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
    });
    this.redis.on('error', (error: Error) => {
      this.logger.warn(`Redis connection error: ${error.message}`);
    });
    this.logger.log('RedisListingCacheAdapter initialized');
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
    this.logger.log('Redis connection closed');
  }

  async get(key: string): Promise<unknown> {
    const data = await this.redis.get(key);
    if (data === null) return null;
    const parsed: unknown = JSON.parse(data);
    return parsed;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.redis.setex(key, ttlSeconds, JSON.stringify(value));
  }

  async invalidate(keyOrPrefix: string): Promise<void> {
    if (!keyOrPrefix.endsWith('*')) {
      await this.redis.del(keyOrPrefix);
      return;
    }

    let cursor = '0';
    let removed = 0;
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', keyOrPrefix, 'COUNT', SCAN_BATCH);
      cursor = next;
      if (keys.length > 0) {
        removed += await this.redis.del(...keys);
      }
    } while (cursor !== '0');

    this.logger.debug(`Invalidated ${removed} keys matching ${keyOrPrefix}`);
  }
}
