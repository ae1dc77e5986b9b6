import { FolderMappingEntity } from '../../../domain/hierarchy/entities/folder-mapping.entity';
import { FolderMappingOrmEntity } from '../entities/folder-mapping.orm-entity';

export class FolderMappingMapper {
  static toDomain(orm: FolderMappingOrmEntity): FolderMappingEntity {
    return new FolderMappingEntity({
      id: orm.id,
      entityType: orm.entityType,
      entityId: orm.entityId,
      externalFolderId: orm.externalFolderId,
      externalFolderUrl: orm.externalFolderUrl,
      createdAt: orm.createdAt,
      deletedAt: orm.deletedAt,
      deletedBy: orm.deletedBy,
      deleteReason: orm.deleteReason,
    });
  }

  static toOrm(domain: FolderMappingEntity): FolderMappingOrmEntity {
    const orm = new FolderMappingOrmEntity();
    orm.id = domain.id;
    orm.entityType = domain.entityType;
    orm.entityId = domain.entityId;
    orm.externalFolderId = domain.externalFolderId;
    orm.externalFolderUrl = domain.externalFolderUrl;
    orm.createdAt = domain.createdAt;
    orm.deletedAt = domain.deletedAt;
    orm.deletedBy = domain.deletedBy;
    orm.deleteReason = domain.deleteReason;
    return orm;
  }
}
