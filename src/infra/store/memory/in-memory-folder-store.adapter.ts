/**
 * 인메모리 폴더 저장소 어댑터
 * IFolderStorePort의 프로세스 내 구현체 (FOLDER_STORE_TYPE=memory)
 *
 * 실제 저장소와 마찬가지로 같은 이름의 폴더를 중복 생성할 수 있습니다.
 * 테스트에서 외부 변경(삭제, 휴지통 이동)과 장애를 흉내 내는 헬퍼를 함께 제공합니다.
 */

import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { BusinessException } from '../../../common/exceptions/business.exception';
import { ErrorCodes } from '../../../common/exceptions/error-codes';
import type {
  CreateFileInput,
  IFolderStorePort,
  StoreItem,
} from '../../../domain/storage/ports/folder-store.port';

type StoreOperation = keyof IFolderStorePort;

interface StoredItem extends StoreItem {
  content?: Buffer;
}

@Injectable()
export class InMemoryFolderStoreAdapter implements IFolderStorePort {
  private readonly logger = new Logger(InMemoryFolderStoreAdapter.name);
  private readonly items = new Map<string, StoredItem>();
  private readonly failures = new Map<StoreOperation, Error[]>();
  private folderCreations = 0;

  constructor(readonly rootId = 'root') {
    this.items.set(rootId, {
      id: rootId,
      name: 'My Drive',
      kind: 'folder',
      parentIds: [],
      createdAt: new Date().toISOString(),
      trashed: false,
    });
  }

  async createFolder(name: string, parentId: string): Promise<StoreItem> {
    this.throwInjectedFailure('createFolder');
    this.requireFolder(parentId);

    const folder: StoredItem = {
      id: uuidv4(),
      name,
      kind: 'folder',
      parentIds: [parentId],
      createdAt: new Date().toISOString(),
      trashed: false,
    };
    folder.url = `memory://folders/${folder.id}`;
    this.items.set(folder.id, folder);
    this.folderCreations++;

    this.logger.debug(`Folder created in memory: ${name} (${folder.id})`);
    return this.toItem(folder);
  }

  async listChildren(folderId: string): Promise<StoreItem[]> {
    this.throwInjectedFailure('listChildren');
    this.requireFolder(folderId);

    return [...this.items.values()]
      .filter((item) => !item.trashed && item.parentIds.includes(folderId))
      .map((item) => this.toItem(item));
  }

  async createFile(input: CreateFileInput): Promise<StoreItem> {
    this.throwInjectedFailure('createFile');
    this.requireFolder(input.parentId);

    const file: StoredItem = {
      id: uuidv4(),
      name: input.name,
      kind: 'file',
      parentIds: [input.parentId],
      mimeType: input.mimeType,
      size: input.content.length,
      content: Buffer.from(input.content),
      createdAt: new Date().toISOString(),
      trashed: false,
    };
    file.url = `memory://files/${file.id}`;
    this.items.set(file.id, file);
    return this.toItem(file);
  }

  async getItem(itemId: string): Promise<StoreItem | null> {
    this.throwInjectedFailure('getItem');
    const item = this.items.get(itemId);
    return item ? this.toItem(item) : null;
  }

  async renameItem(itemId: string, newName: string): Promise<StoreItem> {
    this.throwInjectedFailure('renameItem');
    const item = this.items.get(itemId);
    if (!item) {
      throw BusinessException.of(ErrorCodes.STORE_ITEM_NOT_FOUND, { itemId });
    }
    item.name = newName;
    return this.toItem(item);
  }

  // ============================================
  // 테스트/개발용 헬퍼
  // ============================================

  /**
   * 외부에서 항목이 영구 삭제된 상황 재현 (하위 항목 포함)
   */
  removeItem(itemId: string): void {
    for (const child of [...this.items.values()]) {
      if (child.parentIds.includes(itemId)) {
        this.removeItem(child.id);
      }
    }
    this.items.delete(itemId);
  }

  /**
   * 외부에서 항목이 휴지통으로 이동된 상황 재현
   */
  trashItem(itemId: string): void {
    const item = this.items.get(itemId);
    if (item) item.trashed = true;
  }

  /**
   * 다음 호출(들)을 지정한 에러로 실패시킴
   */
  injectFailure(operation: StoreOperation, error: Error, times = 1): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < times; i++) queue.push(error);
    this.failures.set(operation, queue);
  }

  /**
   * 특정 부모 아래 이름이 일치하는 폴더 목록 (휴지통 제외)
   */
  findFolders(parentId: string, name: string): StoreItem[] {
    return [...this.items.values()]
      .filter((item) => item.kind === 'folder' && !item.trashed && item.name === name && item.parentIds.includes(parentId))
      .map((item) => this.toItem(item));
  }

  /**
   * 루트를 제외한 폴더 수 (휴지통 제외)
   */
  countFolders(): number {
    return [...this.items.values()].filter((item) => item.kind === 'folder' && !item.trashed && item.id !== this.rootId)
      .length;
  }

  /**
   * 지금까지 createFolder 로 생성된 폴더 수 (삭제 여부 무관)
   */
  get createdFolderCount(): number {
    return this.folderCreations;
  }

  private throwInjectedFailure(operation: StoreOperation): void {
    const queue = this.failures.get(operation);
    const error = queue?.shift();
    if (error) throw error;
  }

  private requireFolder(folderId: string): void {
    const folder = this.items.get(folderId);
    if (!folder || folder.kind !== 'folder' || folder.trashed) {
      throw BusinessException.of(ErrorCodes.STORE_ITEM_NOT_FOUND, { folderId });
    }
  }

  private toItem(item: StoredItem): StoreItem {
    const { content: _content, ...rest } = item;
    return { ...rest, parentIds: [...item.parentIds] };
  }
}
