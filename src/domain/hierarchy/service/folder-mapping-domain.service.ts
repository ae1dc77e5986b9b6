/**
 * 폴더 매핑 도메인 서비스
 * FolderMappingEntity 의 행위를 실행하고 영속성을 보장합니다.
 */

import { Inject, Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { FolderMappingEntity } from '../entities/folder-mapping.entity';
import { EntityType } from '../enums/entity-type.enum';
import { FOLDER_MAPPING_REPOSITORY } from '../repositories/folder-mapping.repository.interface';
import type { IFolderMappingRepository, MappingInsertResult } from '../repositories/folder-mapping.repository.interface';

/**
 * 매핑 생성 파라미터
 */
export interface CreateFolderMappingParams {
  entityType: EntityType;
  entityId: string;
  externalFolderId: string;
  externalFolderUrl?: string | null;
}

@Injectable()
export class FolderMappingDomainService {
  constructor(
    @Inject(FOLDER_MAPPING_REPOSITORY)
    private readonly mappingRepository: IFolderMappingRepository,
  ) {}

  // ============================================
  // 조회 메서드 (Query Methods)
  // ============================================

  /**
   * 활성 매핑 조회
   */
  async 조회(entityType: EntityType, entityId: string): Promise<FolderMappingEntity | null> {
    return this.mappingRepository.findByEntity(entityType, entityId);
  }

  /**
   * 활성 매핑 전체 조회
   */
  async 활성목록조회(entityTypes?: EntityType[]): Promise<FolderMappingEntity[]> {
    return this.mappingRepository.findAllLive(entityTypes);
  }

  // ============================================
  // 명령 메서드 (Command Methods)
  // ============================================

  /**
   * 매핑 생성
   * 동일 엔티티의 활성 매핑이 이미 있으면 conflict 를 반환합니다.
   */
  async 생성(params: CreateFolderMappingParams): Promise<MappingInsertResult> {
    const mapping = FolderMappingEntity.create({ id: uuidv4(), ...params });
    return this.mappingRepository.insert(mapping);
  }

  /**
   * 소프트 삭제
   */
  async 삭제(mapping: FolderMappingEntity, deletedBy: string, reason: string): Promise<FolderMappingEntity> {
    mapping.retire(deletedBy, reason);
    await this.mappingRepository.saveDeletion(mapping);
    return mapping;
  }
}
