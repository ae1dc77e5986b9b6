/**
 * 캐시 인프라 모듈
 * 환경 설정에 따라 목록 캐시 어댑터를 주입합니다.
 *
 * 환경변수:
 * - LISTING_CACHE_TYPE: 'memory' | 'redis' | 'none' (기본값: 'memory')
 * - REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis 연결 정보
 */

import { Module, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LISTING_CACHE_PORT } from '../../domain/storage/ports/listing-cache.port';
import { InMemoryListingCacheAdapter } from './in-memory-listing-cache.adapter';
import { NoopListingCacheAdapter } from './noop-listing-cache.adapter';
import { RedisListingCacheAdapter } from './redis-listing-cache.adapter';

/**
 * 목록 캐시 타입
 */
export type ListingCacheType = 'memory' | 'redis' | 'none';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: LISTING_CACHE_PORT,
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('CacheInfraModule');
        const cacheType = configService.get<ListingCacheType>('LISTING_CACHE_TYPE', 'memory');

        logger.log(`Initializing listing cache adapter: ${cacheType}`);

        switch (cacheType) {
          case 'redis':
            return new RedisListingCacheAdapter(configService);
          case 'none':
            return new NoopListingCacheAdapter();
          case 'memory':
          default:
            return new InMemoryListingCacheAdapter();
        }
      },
      inject: [ConfigService],
    },
  ],
  exports: [LISTING_CACHE_PORT],
})
export class CacheInfraModule {}
