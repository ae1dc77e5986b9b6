/**
 * 폴더 매핑 도메인 엔티티
 * (entityType, entityId) 한 쌍이 외부 저장소의 어떤 폴더인지를 기록합니다.
 *
 * 삭제는 소프트 삭제만 허용되며, deletedAt / deletedBy / deleteReason 세 값은
 * 항상 함께 채워지거나 함께 비어 있습니다.
 */

import { EntityType } from '../enums/entity-type.enum';

export interface FolderMappingProps {
  id: string;
  entityType: EntityType;
  entityId: string;
  externalFolderId: string;
  externalFolderUrl?: string | null;
  createdAt: Date;
  deletedAt?: Date | null;
  deletedBy?: string | null;
  deleteReason?: string | null;
}

export class FolderMappingEntity {
  id: string;
  entityType: EntityType;
  entityId: string;
  externalFolderId: string;
  externalFolderUrl: string | null;
  createdAt: Date;
  deletedAt: Date | null;
  deletedBy: string | null;
  deleteReason: string | null;

  constructor(props: FolderMappingProps) {
    const deletedAt = props.deletedAt ?? null;
    const deletedBy = props.deletedBy ?? null;
    const deleteReason = props.deleteReason ?? null;

    const filled = [deletedAt, deletedBy, deleteReason].filter((value) => value !== null).length;
    if (filled !== 0 && filled !== 3) {
      throw new Error('deletedAt, deletedBy, deleteReason은 모두 채워지거나 모두 비어 있어야 합니다.');
    }

    this.id = props.id;
    this.entityType = props.entityType;
    this.entityId = props.entityId;
    this.externalFolderId = props.externalFolderId;
    this.externalFolderUrl = props.externalFolderUrl ?? null;
    this.createdAt = props.createdAt;
    this.deletedAt = deletedAt;
    this.deletedBy = deletedBy;
    this.deleteReason = deleteReason;
  }

  /**
   * 새 매핑 생성 (아직 저장되지 않은 상태)
   */
  static create(params: {
    id: string;
    entityType: EntityType;
    entityId: string;
    externalFolderId: string;
    externalFolderUrl?: string | null;
  }): FolderMappingEntity {
    return new FolderMappingEntity({ ...params, createdAt: new Date() });
  }

  isDeleted(): boolean {
    return this.deletedAt !== null;
  }

  /**
   * 소프트 삭제
   * 이미 삭제된 매핑은 다시 삭제할 수 없습니다.
   */
  retire(deletedBy: string, reason: string, at: Date = new Date()): void {
    if (this.isDeleted()) {
      throw new Error('이미 삭제된 매핑입니다.');
    }
    if (!deletedBy || !reason) {
      throw new Error('삭제자와 삭제 사유는 필수입니다.');
    }
    this.deletedAt = at;
    this.deletedBy = deletedBy;
    this.deleteReason = reason;
  }
}
