import { EntityType } from '../../../domain/hierarchy/enums/entity-type.enum';
import { FolderMappingOrmEntity } from '../entities/folder-mapping.orm-entity';
import { FolderMappingMapper } from './folder-mapping.mapper';

describe('FolderMappingMapper', () => {
  it('소프트 삭제 필드를 포함해 ORM ↔ 도메인 변환 시 값이 유지되어야 한다', () => {
    // 📥 GIVEN
    const orm = new FolderMappingOrmEntity();
    orm.id = 'm-1';
    orm.entityType = EntityType.LEAD;
    orm.entityId = 'L1';
    orm.externalFolderId = 'folder-9';
    orm.externalFolderUrl = null;
    orm.createdAt = new Date('2026-01-01T00:00:00Z');
    orm.deletedAt = new Date('2026-01-02T00:00:00Z');
    orm.deletedBy = 'system';
    orm.deleteReason = 'reconciled_trash';

    // 🎬 WHEN
    const domain = FolderMappingMapper.toDomain(orm);
    const back = FolderMappingMapper.toOrm(domain);

    // ✅ THEN
    expect(domain.isDeleted()).toBe(true);
    expect(domain.deleteReason).toBe('reconciled_trash');
    expect(back).toEqual(orm);
  });
});
