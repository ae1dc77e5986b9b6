/**
 * 폴더 매핑 리포지토리 인터페이스
 *
 * (entityType, entityId) 유일성은 삭제되지 않은 행에 대해서만 DB 유니크 인덱스로 강제됩니다.
 * insert 는 유일성 위반을 예외가 아닌 'conflict' 결과로 돌려줍니다.
 */

import { FolderMappingEntity } from '../entities/folder-mapping.entity';
import { EntityType } from '../enums/entity-type.enum';

export type MappingInsertResult =
  | { status: 'inserted'; mapping: FolderMappingEntity }
  | { status: 'conflict' };

export interface IFolderMappingRepository {
  /**
   * 매핑 저장 (유일성 위반 시 conflict)
   */
  insert(mapping: FolderMappingEntity): Promise<MappingInsertResult>;

  /**
   * 삭제되지 않은 매핑 조회
   */
  findByEntity(entityType: EntityType, entityId: string): Promise<FolderMappingEntity | null>;

  /**
   * 소프트 삭제된 행까지 포함해 조회 (최신 생성 순)
   */
  findByEntityIncludingDeleted(entityType: EntityType, entityId: string): Promise<FolderMappingEntity[]>;

  /**
   * 삭제되지 않은 전체 매핑 조회
   */
  findAllLive(entityTypes?: EntityType[]): Promise<FolderMappingEntity[]>;

  /**
   * 소프트 삭제 필드 반영
   */
  saveDeletion(mapping: FolderMappingEntity): Promise<void>;
}

export const FOLDER_MAPPING_REPOSITORY = Symbol('FOLDER_MAPPING_REPOSITORY');
