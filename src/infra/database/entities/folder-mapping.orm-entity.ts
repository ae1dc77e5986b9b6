/**
 * FolderMapping TypeORM Entity
 * 엔티티 ↔ 외부 폴더 매핑 테이블
 *
 * (entityType, entityId) 는 deletedAt 이 NULL 인 행 사이에서만 유일합니다 (부분 유니크 인덱스).
 */
import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { EntityType } from '../../../domain/hierarchy/enums/entity-type.enum';

@Entity('folder_mappings')
@Index('UQ_folder_mappings_live_entity', ['entityType', 'entityId'], {
  unique: true,
  where: '"deletedAt" IS NULL',
})
export class FolderMappingOrmEntity {
  @PrimaryColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 32 })
  @Index()
  entityType!: EntityType;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  entityId!: string;

  @Column({ type: 'varchar', length: 255 })
  @Index()
  externalFolderId!: string;

  @Column({ type: 'varchar', length: 1024, nullable: true })
  externalFolderUrl!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  @Index()
  deletedAt!: Date | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  deletedBy!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  deleteReason!: string | null;
}
