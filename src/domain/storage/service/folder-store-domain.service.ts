/**
 * 폴더 저장소 도메인 서비스
 *
 * 외부 저장소 포트와 목록 캐시 포트를 묶어 다음 규칙을 적용합니다.
 * - 모든 원격 호출(저장소, 캐시)에 제한 시간
 * - 목록 조회: 캐시 실패는 miss 로 취급, 직접 조회 실패는 1회 재조회 후 STORE_UNAVAILABLE
 * - 쓰기: 타임아웃은 STORE_WRITE_AMBIGUOUS (재시도 없음), 그 외 실패는 STORE_UNAVAILABLE
 * - 쓰기 성공 시 부모 폴더의 목록 캐시 무효화
 * - 조회 중에 같은 키가 무효화되면 그 조회 결과는 캐시에 쓰지 않음
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BusinessException } from '../../../common/exceptions/business.exception';
import { ErrorCodes } from '../../../common/exceptions/error-codes';
import { OperationTimeoutError, withTimeout } from '../../../common/utils/with-timeout';
import { FOLDER_STORE_PORT } from '../ports/folder-store.port';
import type { CreateFileInput, IFolderStorePort, StoreItem } from '../ports/folder-store.port';
import { LISTING_CACHE_PORT, listingCacheKey } from '../ports/listing-cache.port';
import type { IListingCachePort } from '../ports/listing-cache.port';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isStoreItem(value: unknown): value is StoreItem {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'kind' in value &&
    (value.kind === 'folder' || value.kind === 'file') &&
    'parentIds' in value &&
    Array.isArray(value.parentIds)
  );
}

function isStoreItemList(value: unknown): value is StoreItem[] {
  return Array.isArray(value) && value.every(isStoreItem);
}

/**
 * 진행 중인 목록 조회 (조회 도중 무효화되었는지 표시)
 */
interface InflightListing {
  invalidated: boolean;
}

/**
 * 폴더명 비교용 정규화 (앞뒤 공백 제거)
 */
export function normalizeFolderName(name: string): string {
  return name.trim();
}

@Injectable()
export class FolderStoreDomainService {
  private readonly logger = new Logger(FolderStoreDomainService.name);
  private readonly readTimeoutMs: number;
  private readonly writeTimeoutMs: number;
  private readonly cacheTimeoutMs: number;
  private readonly cacheTtlSeconds: number;
  private readonly inflightListings = new Map<string, Set<InflightListing>>();

  constructor(
    @Inject(FOLDER_STORE_PORT)
    private readonly store: IFolderStorePort,
    @Inject(LISTING_CACHE_PORT)
    private readonly cache: IListingCachePort,
    configService: ConfigService,
  ) {
    this.readTimeoutMs = Number(configService.get('STORE_READ_TIMEOUT_MS', 10000));
    this.writeTimeoutMs = Number(configService.get('STORE_WRITE_TIMEOUT_MS', 20000));
    this.cacheTimeoutMs = Number(configService.get('CACHE_TIMEOUT_MS', 2000));
    this.cacheTtlSeconds = Number(configService.get('LISTING_CACHE_TTL', 180));
  }

  // ============================================
  // 조회 메서드 (Query Methods)
  // ============================================

  /**
   * 폴더 하위 목록 조회 (캐시 우선)
   */
  async 하위목록조회(folderId: string): Promise<StoreItem[]> {
    const key = listingCacheKey(folderId);

    const cached = await this.캐시조회(key);
    if (cached) {
      this.logger.debug(`Listing cache hit: ${folderId} (${cached.length} items)`);
      return cached;
    }

    return this.listAndCache(folderId);
  }

  /**
   * 폴더 하위 목록 직접 조회 (캐시 미사용, 캐시 갱신)
   */
  async 하위목록직접조회(folderId: string): Promise<StoreItem[]> {
    return this.listAndCache(folderId);
  }

  /**
   * 이름으로 하위 폴더 찾기 (앞뒤 공백 무시, 첫 번째 일치 항목)
   */
  async 하위폴더찾기(parentId: string, name: string): Promise<StoreItem | null> {
    const target = normalizeFolderName(name);
    const children = await this.하위목록조회(parentId);
    return children.find((item) => item.kind === 'folder' && normalizeFolderName(item.name) === target) ?? null;
  }

  /**
   * 단일 항목 조회 (없으면 null)
   */
  async 항목조회(itemId: string): Promise<StoreItem | null> {
    return this.readWithRetry(() => this.store.getItem(itemId), `getItem(${itemId})`);
  }

  // ============================================
  // 명령 메서드 (Command Methods)
  // ============================================

  /**
   * 폴더 생성
   */
  async 폴더생성(name: string, parentId: string): Promise<StoreItem> {
    const folder = await this.write(() => this.store.createFolder(name, parentId), `createFolder(${name})`);
    this.logger.log(`Folder created: "${name}" (${folder.id}) under ${parentId}`);
    await this.캐시무효화(listingCacheKey(parentId));
    return folder;
  }

  /**
   * 파일 생성
   */
  async 파일생성(input: CreateFileInput): Promise<StoreItem> {
    const file = await this.write(() => this.store.createFile(input), `createFile(${input.name})`);
    this.logger.log(`File created: "${input.name}" (${file.id}) under ${input.parentId}`);
    await this.캐시무효화(listingCacheKey(input.parentId));
    return file;
  }

  /**
   * 항목 이름 변경
   */
  async 이름변경(itemId: string, newName: string): Promise<StoreItem> {
    const item = await this.write(() => this.store.renameItem(itemId, newName), `renameItem(${itemId})`);
    this.logger.log(`Item renamed: ${itemId} → "${newName}"`);
    for (const parentId of item.parentIds) {
      await this.캐시무효화(listingCacheKey(parentId));
    }
    return item;
  }

  /**
   * 캐시 무효화 (끝이 `*` 이면 접두사 무효화)
   * 실패는 로그만 남깁니다.
   */
  async 캐시무효화(keyOrPrefix: string): Promise<void> {
    this.markInflightInvalidated(keyOrPrefix);
    try {
      await withTimeout(this.cache.invalidate(keyOrPrefix), this.cacheTimeoutMs, `cache.invalidate(${keyOrPrefix})`);
    } catch (error) {
      this.logger.warn(`Cache invalidation failed for ${keyOrPrefix}: ${errorMessage(error)}`);
    }
  }

  // ============================================
  // 내부 헬퍼
  // ============================================

  /**
   * 저장소에서 목록을 읽어 캐시에 씁니다.
   * 읽는 동안 같은 키가 무효화되었다면 캐시에 쓰지 않습니다.
   */
  private async listAndCache(folderId: string): Promise<StoreItem[]> {
    const key = listingCacheKey(folderId);
    const listing: InflightListing = { invalidated: false };
    const inflight = this.inflightListings.get(key) ?? new Set<InflightListing>();
    inflight.add(listing);
    this.inflightListings.set(key, inflight);

    try {
      const children = await this.readWithRetry(() => this.store.listChildren(folderId), `listChildren(${folderId})`);
      if (listing.invalidated) {
        this.logger.debug(`Listing of ${folderId} was invalidated while reading, not caching`);
      } else {
        await this.캐시저장(key, children);
      }
      return children;
    } finally {
      inflight.delete(listing);
      if (inflight.size === 0 && this.inflightListings.get(key) === inflight) {
        this.inflightListings.delete(key);
      }
    }
  }

  private markInflightInvalidated(keyOrPrefix: string): void {
    const prefix = keyOrPrefix.endsWith('*') ? keyOrPrefix.slice(0, -1) : null;
    for (const [key, listings] of this.inflightListings) {
      if (prefix !== null ? key.startsWith(prefix) : key === keyOrPrefix) {
        for (const listing of listings) {
          listing.invalidated = true;
        }
      }
    }
  }

  private async 캐시조회(key: string): Promise<StoreItem[] | null> {
    try {
      const value = await withTimeout(this.cache.get(key), this.cacheTimeoutMs, `cache.get(${key})`);
      if (value === null || value === undefined) return null;
      if (!isStoreItemList(value)) {
        this.logger.warn(`Ignoring malformed cache entry: ${key}`);
        return null;
      }
      return value;
    } catch (error) {
      this.logger.warn(`Cache read failed for ${key}, falling back to store: ${errorMessage(error)}`);
      return null;
    }
  }

  private async 캐시저장(key: string, children: StoreItem[]): Promise<void> {
    try {
      await withTimeout(this.cache.set(key, children, this.cacheTtlSeconds), this.cacheTimeoutMs, `cache.set(${key})`);
    } catch (error) {
      this.logger.warn(`Cache write failed for ${key}: ${errorMessage(error)}`);
    }
  }

  /**
   * 읽기 호출: 실패 또는 타임아웃 시 1회 재조회, 다시 실패하면 STORE_UNAVAILABLE
   */
  private async readWithRetry<T>(call: () => Promise<T>, label: string): Promise<T> {
    try {
      return await withTimeout(call(), this.readTimeoutMs, label);
    } catch (firstError) {
      if (firstError instanceof BusinessException) throw firstError;
      this.logger.warn(`${label} failed, retrying once: ${errorMessage(firstError)}`);
    }

    try {
      return await withTimeout(call(), this.readTimeoutMs, label);
    } catch (error) {
      if (error instanceof BusinessException) throw error;
      this.logger.error(`${label} failed after retry: ${errorMessage(error)}`);
      throw BusinessException.of(ErrorCodes.STORE_UNAVAILABLE, { operation: label, cause: errorMessage(error) });
    }
  }

  /**
   * 쓰기 호출: 재시도하지 않음
   */
  private async write<T>(call: () => Promise<T>, label: string): Promise<T> {
    try {
      return await withTimeout(call(), this.writeTimeoutMs, label);
    } catch (error) {
      if (error instanceof BusinessException) throw error;

      if (error instanceof OperationTimeoutError) {
        this.logger.error(`${label} timed out, outcome unknown`);
        throw BusinessException.of(ErrorCodes.STORE_WRITE_AMBIGUOUS, { operation: label, timeoutMs: error.timeoutMs });
      }

      this.logger.error(`${label} failed: ${errorMessage(error)}`);
      throw BusinessException.of(ErrorCodes.STORE_UNAVAILABLE, { operation: label, cause: errorMessage(error) });
    }
  }
}
