import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { EntityType, FolderMappingEntity } from '../../../../domain/hierarchy';
import type { StoreItem } from '../../../../domain/storage';
import type { EntityFolderListing } from '../../../../business/hierarchy/entity-drive.service';
import type { MappingReconcileResult } from '../../../../business/hierarchy/mapping-reconcile.scheduler';

/**
 * 폴더 매핑 응답 DTO
 */
export class FolderMappingResponseDto {
  @ApiProperty({ description: '매핑 ID' })
  id!: string;

  @ApiProperty({ description: '엔티티 유형', enum: EntityType })
  entityType!: EntityType;

  @ApiProperty({ description: '엔티티 ID' })
  entityId!: string;

  @ApiProperty({ description: '외부 폴더 ID', example: '1AbCdEfGhIjKlMnOp' })
  externalFolderId!: string;

  @ApiProperty({ description: '외부 폴더 URL', nullable: true, type: String })
  externalFolderUrl!: string | null;

  @ApiProperty({ description: '생성 시간' })
  createdAt!: string;

  @ApiPropertyOptional({ description: '삭제 시간', nullable: true, type: String })
  deletedAt?: string | null;

  @ApiPropertyOptional({ description: '삭제 사유', nullable: true, type: String })
  deleteReason?: string | null;

  static from(mapping: FolderMappingEntity): FolderMappingResponseDto {
    return Object.assign(new FolderMappingResponseDto(), {
      id: mapping.id,
      entityType: mapping.entityType,
      entityId: mapping.entityId,
      externalFolderId: mapping.externalFolderId,
      externalFolderUrl: mapping.externalFolderUrl,
      createdAt: mapping.createdAt.toISOString(),
      deletedAt: mapping.deletedAt?.toISOString() ?? null,
      deleteReason: mapping.deleteReason,
    });
  }
}

/**
 * 처리 결과 응답 DTO (repair / sync-name)
 */
export class HierarchyActionResponseDto {
  @ApiProperty({ description: '변경 여부', example: true })
  changed!: boolean;
}

/**
 * 저장소 항목 DTO
 */
export class StoreItemDto {
  @ApiProperty({ description: '항목 ID' })
  id!: string;

  @ApiProperty({ description: '이름', example: '00. Administração do Deal' })
  name!: string;

  @ApiProperty({ description: '종류', enum: ['folder', 'file'] })
  kind!: 'folder' | 'file';

  @ApiPropertyOptional({ description: '열기 URL' })
  url?: string;

  @ApiPropertyOptional({ description: '파일 크기 (바이트)' })
  size?: number;

  @ApiPropertyOptional({ description: 'MIME 타입' })
  mimeType?: string;

  @ApiPropertyOptional({ description: '생성 시간' })
  createdAt?: string;

  static from(item: StoreItem): StoreItemDto {
    return Object.assign(new StoreItemDto(), {
      id: item.id,
      name: item.name,
      kind: item.kind,
      url: item.url,
      size: item.size,
      mimeType: item.mimeType,
      createdAt: item.createdAt,
    });
  }
}

/**
 * 엔티티 폴더 목록 응답 DTO
 */
export class EntityFolderListingResponseDto {
  @ApiProperty({ description: '엔티티 폴더 ID' })
  folderId!: string;

  @ApiProperty({ description: '엔티티 폴더 URL', nullable: true, type: String })
  folderUrl!: string | null;

  @ApiProperty({ description: '하위 항목 (폴더 먼저, 이름순)', type: [StoreItemDto] })
  items!: StoreItemDto[];

  static from(listing: EntityFolderListing): EntityFolderListingResponseDto {
    return Object.assign(new EntityFolderListingResponseDto(), {
      folderId: listing.folderId,
      folderUrl: listing.folderUrl,
      items: listing.items.map((item) => StoreItemDto.from(item)),
    });
  }
}

/**
 * 매핑 정리 결과 응답 DTO
 */
export class MappingReconcileResponseDto {
  @ApiProperty({ description: '이미 실행 중이라 건너뛰었는지 여부' })
  skipped!: boolean;

  @ApiPropertyOptional({ description: '확인한 활성 매핑 수' })
  checked?: number;

  @ApiPropertyOptional({ description: '폴더가 사라져 삭제한 매핑 수' })
  retiredMissing?: number;

  @ApiPropertyOptional({ description: '폴더가 휴지통에 있어 삭제한 매핑 수' })
  retiredTrashed?: number;

  @ApiPropertyOptional({ description: '확인에 실패한 매핑 수' })
  failed?: number;

  @ApiPropertyOptional({ description: '소요 시간 (ms)' })
  durationMs?: number;

  static from(result: MappingReconcileResult | null): MappingReconcileResponseDto {
    if (!result) {
      return Object.assign(new MappingReconcileResponseDto(), { skipped: true });
    }
    return Object.assign(new MappingReconcileResponseDto(), { skipped: false, ...result });
  }
}
