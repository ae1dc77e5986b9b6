/**
 * 목록 캐시 포트
 * "폴더 하위 목록" 결과를 TTL 과 함께 보관하는 best-effort 캐시입니다.
 *
 * 구현체:
 * - InMemoryListingCacheAdapter: 프로세스 메모리 (LISTING_CACHE_TYPE=memory)
 * - RedisListingCacheAdapter: Redis (LISTING_CACHE_TYPE=redis)
 * - NoopListingCacheAdapter: 캐시 미사용 (LISTING_CACHE_TYPE=none)
 */

export interface IListingCachePort {
  /**
   * 값 조회 (없거나 만료되면 null)
   * 값의 형태는 호출자가 검증합니다.
   */
  get(key: string): Promise<unknown>;

  /**
   * 값 저장
   * @param ttlSeconds - 만료 시간(초)
   */
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;

  /**
   * 키 무효화. 끝이 `*` 이면 접두사로 일치하는 모든 키를 무효화합니다.
   */
  invalidate(keyOrPrefix: string): Promise<void>;
}

export const LISTING_CACHE_PORT = Symbol('LISTING_CACHE_PORT');

/**
 * 폴더 하위 목록 캐시 키
 */
export function listingCacheKey(folderId: string): string {
  return `drive:list_files:${folderId}`;
}
