import { Injectable, Logger } from '@nestjs/common';
import { BusinessEntityType } from '../../domain/hierarchy';
import { FolderStoreDomainService, type StoreItem } from '../../domain/storage';
import { HierarchyService } from './hierarchy.service';

/**
 * 업로드 파일 입력
 */
export interface UploadFileInput {
  content: Buffer;
  name: string;
  mimeType: string;
}

/**
 * 엔티티 폴더 목록
 */
export interface EntityFolderListing {
  folderId: string;
  folderUrl: string | null;
  items: StoreItem[];
}

/**
 * 엔티티 드라이브 비즈니스 서비스
 * 엔티티 폴더를 보장한 뒤 목록 조회와 파일 업로드를 수행합니다.
 */
@Injectable()
export class EntityDriveService {
  private readonly logger = new Logger(EntityDriveService.name);

  constructor(
    private readonly hierarchyService: HierarchyService,
    private readonly folderStoreDomainService: FolderStoreDomainService,
  ) {}

  /**
   * 엔티티 폴더 하위 목록 (폴더 먼저, 이름순)
   */
  async listEntityFolder(entityType: BusinessEntityType, entityId: string): Promise<EntityFolderListing> {
    const mapping = await this.hierarchyService.ensureStructure(entityType, entityId);
    const items = await this.folderStoreDomainService.하위목록조회(mapping.externalFolderId);

    return {
      folderId: mapping.externalFolderId,
      folderUrl: mapping.externalFolderUrl,
      items: [...items].sort((a, b) => {
        if (a.kind !== b.kind) return a.kind === 'folder' ? -1 : 1;
        return a.name.localeCompare(b.name);
      }),
    };
  }

  /**
   * 엔티티 폴더에 파일 업로드
   */
  async uploadFile(entityType: BusinessEntityType, entityId: string, file: UploadFileInput): Promise<StoreItem> {
    const mapping = await this.hierarchyService.ensureStructure(entityType, entityId);

    const created = await this.folderStoreDomainService.파일생성({
      content: file.content,
      name: file.name,
      mimeType: file.mimeType,
      parentId: mapping.externalFolderId,
    });

    this.logger.log(`Uploaded "${file.name}" (${file.content.length} bytes) to ${entityType}:${entityId}`);
    return created;
  }
}
