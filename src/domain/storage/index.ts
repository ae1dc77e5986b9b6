/**
 * 저장소 도메인 모듈 내보내기
 */

export type { CreateFileInput, IFolderStorePort, StoreItem, StoreItemKind } from './ports/folder-store.port';
export { FOLDER_STORE_PORT } from './ports/folder-store.port';
export type { IListingCachePort } from './ports/listing-cache.port';
export { LISTING_CACHE_PORT, listingCacheKey } from './ports/listing-cache.port';
export * from './service/folder-store-domain.service';
export * from './storage.module';
