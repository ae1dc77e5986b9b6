/**
 * 폴더 저장소 포트
 * 실제 구현은 Infrastructure에서 어댑터로 제공됩니다.
 *
 * 구현체:
 * - InMemoryFolderStoreAdapter: 프로세스 내 저장소 (개발/테스트, FOLDER_STORE_TYPE=memory)
 * - GoogleDriveFolderStoreAdapter: Google Drive v3 (FOLDER_STORE_TYPE=google-drive)
 *
 * 모든 어댑터는 아래 메서드를 전부 구현합니다. 같은 이름/부모로 createFolder 를
 * 두 번 호출하면 폴더가 두 개 생깁니다 (저장소는 멱등성을 보장하지 않음).
 */

export type StoreItemKind = 'folder' | 'file';

/**
 * 저장소 항목 (폴더 또는 파일)
 */
export interface StoreItem {
  id: string;
  name: string;
  kind: StoreItemKind;
  parentIds: string[];
  url?: string;
  size?: number;
  mimeType?: string;
  /** ISO 8601 */
  createdAt?: string;
  trashed?: boolean;
}

/**
 * 파일 생성 입력
 */
export interface CreateFileInput {
  content: Buffer;
  name: string;
  mimeType: string;
  parentId: string;
}

export interface IFolderStorePort {
  /**
   * 폴더 생성
   */
  createFolder(name: string, parentId: string): Promise<StoreItem>;

  /**
   * 폴더의 직접 하위 항목 목록 (휴지통 항목 제외)
   */
  listChildren(folderId: string): Promise<StoreItem[]>;

  /**
   * 파일 생성
   */
  createFile(input: CreateFileInput): Promise<StoreItem>;

  /**
   * 단일 항목 조회 (휴지통 항목 포함, 없으면 null)
   */
  getItem(itemId: string): Promise<StoreItem | null>;

  /**
   * 항목 이름 변경
   */
  renameItem(itemId: string, newName: string): Promise<StoreItem>;
}

export const FOLDER_STORE_PORT = Symbol('FOLDER_STORE_PORT');
