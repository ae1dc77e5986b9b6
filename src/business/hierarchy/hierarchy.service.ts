import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BusinessException } from '../../common/exceptions/business.exception';
import { ErrorCodes } from '../../common/exceptions/error-codes';
import { CrmEntitySummary, CrmRecordDomainService } from '../../domain/crm';
import {
  BusinessEntityType,
  EntityType,
  FolderMappingDomainService,
  FolderMappingEntity,
} from '../../domain/hierarchy';
import { FolderStoreDomainService, type StoreItem } from '../../domain/storage';
import { TemplateMaterializerService } from '../template/template-materializer.service';
import {
  COMPANIES_ROOT_ENTITY_ID,
  COMPANIES_ROOT_FOLDER_NAME,
  STRUCTURAL_FOLDER_NAMES,
} from './hierarchy.constants';

/**
 * 매핑 저장 결과
 */
interface PersistedMapping {
  mapping: FolderMappingEntity;
  /** 이번 호출이 매핑을 만들었는지 (경합에서 졌으면 false) */
  created: boolean;
}

/**
 * 폴더 계층 비즈니스 서비스
 *
 * 회사/리드/딜마다 외부 폴더가 정확히 하나 매핑되도록 보장합니다.
 *   Companies / {회사} / 01. Leads / Lead - {이름}
 *   Companies / {회사} / 02. Deals / Deal - {이름}
 *
 * 동시 호출 간 경합은 매핑 테이블의 부분 유니크 인덱스만으로 판정합니다.
 * 경합에서 진 호출이 만든 외부 폴더는 고아로 남습니다.
 */
@Injectable()
export class HierarchyService {
  private readonly logger = new Logger(HierarchyService.name);
  private readonly driveRootFolderId: string;

  constructor(
    private readonly mappingDomainService: FolderMappingDomainService,
    private readonly crmRecordDomainService: CrmRecordDomainService,
    private readonly folderStoreDomainService: FolderStoreDomainService,
    private readonly templateMaterializer: TemplateMaterializerService,
    configService: ConfigService,
  ) {
    this.driveRootFolderId = configService.get<string>('DRIVE_ROOT_FOLDER_ID', 'root');
  }

  // ============================================
  // 구조 보장
  // ============================================

  /**
   * 엔티티 폴더 보장 (멱등)
   *
   * 활성 매핑이 있으면 그대로 반환하고, 없으면 상위 폴더를 확보한 뒤
   * 엔티티 폴더를 만들고 매핑을 저장합니다. 템플릿은 이번 호출이 매핑을 만든 경우에만 적용합니다.
   */
  async ensureStructure(entityType: BusinessEntityType, entityId: string): Promise<FolderMappingEntity> {
    // 1. 기존 매핑 (빠른 경로)
    const existing = await this.mappingDomainService.조회(entityType, entityId);
    if (existing) {
      this.logger.debug(`Mapping exists for ${entityType}:${entityId} → ${existing.externalFolderId}`);
      return existing;
    }

    // 2. 엔티티 확인
    const summary = await this.crmRecordDomainService.요약조회(entityType, entityId);
    if (!summary) {
      throw BusinessException.of(ErrorCodes.HIERARCHY_ENTITY_NOT_FOUND, { entityType, entityId });
    }

    // 3. 상위 폴더 확보
    const parentFolderId = await this.resolveParentFolder(summary);

    // 4. 엔티티 폴더 생성 (이름이 같아도 재사용하지 않음)
    const folder = await this.folderStoreDomainService.폴더생성(summary.folderName, parentFolderId);

    // 5. 매핑 저장 (경합 시 승자의 매핑 반환)
    const { mapping, created } = await this.persistMapping(entityType, entityId, folder);

    // 6. 템플릿 적용
    if (created) {
      await this.templateMaterializer.applyTemplate(entityType, mapping.externalFolderId);
    }

    return mapping;
  }

  /**
   * 구조 복구
   *
   * 매핑된 폴더에 템플릿을 다시 적용합니다. 엔티티 폴더 자체는 다시 만들지 않으며,
   * 외부에서 삭제된 템플릿 폴더만 새로 생성됩니다.
   *
   * @returns 활성 템플릿이 없으면 false
   */
  async repairStructure(entityType: BusinessEntityType, entityId: string): Promise<boolean> {
    const mapping = await this.mappingDomainService.조회(entityType, entityId);
    if (!mapping) {
      // 매핑이 없으면 생성 경로가 템플릿까지 적용함
      await this.ensureStructure(entityType, entityId);
      return true;
    }

    this.logger.log(`Repairing ${entityType}:${entityId} (folder ${mapping.externalFolderId})`);
    const result = await this.templateMaterializer.applyTemplate(entityType, mapping.externalFolderId, { fresh: true });
    return result !== null;
  }

  /**
   * 폴더명 동기화
   * 엔티티 이름이 바뀌었으면 매핑된 폴더 이름을 현재 표시 이름으로 변경합니다.
   *
   * @returns 이름을 변경했으면 true
   */
  async syncFolderName(entityType: BusinessEntityType, entityId: string): Promise<boolean> {
    const mapping = await this.mappingDomainService.조회(entityType, entityId);
    if (!mapping) {
      return false;
    }

    const summary = await this.crmRecordDomainService.요약조회(entityType, entityId);
    if (!summary) {
      this.logger.warn(`Cannot sync folder name: ${entityType}:${entityId} not found`);
      return false;
    }

    const folder = await this.folderStoreDomainService.항목조회(mapping.externalFolderId);
    if (!folder) {
      throw BusinessException.of(ErrorCodes.STORE_ITEM_NOT_FOUND, {
        entityType,
        entityId,
        folderId: mapping.externalFolderId,
      });
    }

    if (folder.name === summary.folderName) {
      return false;
    }

    await this.folderStoreDomainService.이름변경(mapping.externalFolderId, summary.folderName);
    this.logger.log(`Renamed folder for ${entityType}:${entityId}: "${folder.name}" → "${summary.folderName}"`);
    return true;
  }

  /**
   * 매핑 소프트 삭제 (외부 폴더는 그대로 둠)
   */
  async retireMapping(
    entityType: EntityType,
    entityId: string,
    deletedBy: string,
    reason: string,
  ): Promise<FolderMappingEntity> {
    const mapping = await this.mappingDomainService.조회(entityType, entityId);
    if (!mapping) {
      throw BusinessException.of(ErrorCodes.HIERARCHY_MAPPING_NOT_FOUND, { entityType, entityId });
    }

    await this.mappingDomainService.삭제(mapping, deletedBy, reason);
    this.logger.log(`Mapping retired for ${entityType}:${entityId} by ${deletedBy} (${reason})`);
    return mapping;
  }

  // ============================================
  // 내부 헬퍼
  // ============================================

  /**
   * "Companies" 최상위 폴더 매핑 보장
   */
  async ensureSystemRoot(): Promise<FolderMappingEntity> {
    const existing = await this.mappingDomainService.조회(EntityType.SYSTEM_ROOT, COMPANIES_ROOT_ENTITY_ID);
    if (existing) {
      return existing;
    }

    if (!this.driveRootFolderId) {
      throw BusinessException.of(ErrorCodes.HIERARCHY_ROOT_NOT_CONFIGURED);
    }

    const folder = await this.findOrCreateFolder(COMPANIES_ROOT_FOLDER_NAME, this.driveRootFolderId);
    const { mapping } = await this.persistMapping(EntityType.SYSTEM_ROOT, COMPANIES_ROOT_ENTITY_ID, folder);
    return mapping;
  }

  /**
   * 엔티티 폴더가 들어갈 상위 폴더 ID
   * - 회사: Companies 최상위 폴더
   * - 리드/딜: 회사 폴더 아래 구조 폴더 (회사가 없으면 Companies 최상위 폴더)
   */
  private async resolveParentFolder(summary: CrmEntitySummary): Promise<string> {
    if (summary.entityType === EntityType.COMPANY) {
      return (await this.ensureSystemRoot()).externalFolderId;
    }

    if (!summary.companyId) {
      this.logger.warn(`${summary.entityType}:${summary.entityId} has no company, creating under the root folder`);
      return (await this.ensureSystemRoot()).externalFolderId;
    }

    const companyMapping = await this.ensureStructure(EntityType.COMPANY, summary.companyId);
    const structural = await this.findOrCreateFolder(
      STRUCTURAL_FOLDER_NAMES[summary.entityType],
      companyMapping.externalFolderId,
    );
    return structural.id;
  }

  /**
   * 이름으로 하위 폴더를 찾고, 없으면 생성 (첫 번째 일치 항목 사용)
   */
  private async findOrCreateFolder(name: string, parentId: string): Promise<StoreItem> {
    const existing = await this.folderStoreDomainService.하위폴더찾기(parentId, name);
    if (existing) {
      this.logger.debug(`Reusing folder "${name}" (${existing.id}) under ${parentId}`);
      return existing;
    }
    return this.folderStoreDomainService.폴더생성(name, parentId);
  }

  /**
   * 매핑 저장. 유일성 충돌이면 승자의 매핑을 다시 읽어 반환합니다.
   */
  private async persistMapping(entityType: EntityType, entityId: string, folder: StoreItem): Promise<PersistedMapping> {
    const result = await this.mappingDomainService.생성({
      entityType,
      entityId,
      externalFolderId: folder.id,
      externalFolderUrl: folder.url ?? null,
    });

    if (result.status === 'inserted') {
      this.logger.log(`Mapping created for ${entityType}:${entityId} → ${folder.id}`);
      return { mapping: result.mapping, created: true };
    }

    this.logger.warn(`Lost mapping race for ${entityType}:${entityId}; folder ${folder.id} is left orphaned`);
    const winner = await this.mappingDomainService.조회(entityType, entityId);
    if (!winner) {
      throw BusinessException.of(ErrorCodes.HIERARCHY_MAPPING_CONFLICT_UNRESOLVED, {
        entityType,
        entityId,
        orphanFolderId: folder.id,
      });
    }
    return { mapping: winner, created: false };
  }
}
