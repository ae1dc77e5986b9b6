import { Injectable, OnModuleDestroy } from '@nestjs/common';
import type { IListingCachePort } from '../../domain/storage/ports/listing-cache.port';

interface CacheEntry {
  value: string;
  expiresAt: number;
  timer: NodeJS.Timeout;
}

/**
 * 인메모리 목록 캐시 구현체
 *
 * 단일 프로세스용. 값은 JSON 문자열로 보관해 호출자 간 객체 공유를 막습니다.
 * 항목마다 만료 시점에 삭제를 예약하고, 조회 시점에도 만료를 확인합니다.
 */
@Injectable()
export class InMemoryListingCacheAdapter implements IListingCachePort, OnModuleDestroy {
  private readonly store = new Map<string, CacheEntry>();

  async get(key: string): Promise<unknown> {
    const entry = this.store.get(key);
    if (!entry) return null;

    // 만료 확인
    if (Date.now() >= entry.expiresAt) {
      this.remove(key);
      return null;
    }

    const parsed: unknown = JSON.parse(entry.value);
    return parsed;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.remove(key);

    // 자동 정리 스케줄
    const timer = setTimeout(() => {
      this.store.delete(key);
    }, ttlSeconds * 1000);
    timer.unref();

    this.store.set(key, { value: JSON.stringify(value), expiresAt: Date.now() + ttlSeconds * 1000, timer });
  }

  async invalidate(keyOrPrefix: string): Promise<void> {
    if (!keyOrPrefix.endsWith('*')) {
      this.remove(keyOrPrefix);
      return;
    }

    const prefix = keyOrPrefix.slice(0, -1);
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.remove(key);
      }
    }
  }

  onModuleDestroy(): void {
    for (const key of [...this.store.keys()]) {
      this.remove(key);
    }
  }

  /**
   * 저장된 키 수
   */
  size(): number {
    return this.store.size;
  }

  private remove(key: string): void {
    const entry = this.store.get(key);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.store.delete(key);
  }
}
