import { Injectable } from '@nestjs/common';
import type { IListingCachePort } from '../../domain/storage/ports/listing-cache.port';

/**
 * 캐시 미사용 어댑터 (LISTING_CACHE_TYPE=none)
 * 모든 조회는 miss 이며, 저장/무효화는 아무 일도 하지 않습니다.
 */
@Injectable()
export class NoopListingCacheAdapter implements IListingCachePort {
  async get(_key: string): Promise<unknown> {
    return null;
  }

  async set(_key: string, _value: unknown, _ttlSeconds: number): Promise<void> {}

  async invalidate(_keyOrPrefix: string): Promise<void> {}
}
