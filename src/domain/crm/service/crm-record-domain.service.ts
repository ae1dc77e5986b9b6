/**
 * CRM 기록 도메인 서비스
 * 엔티티 유형별 조회를 폴더 계층에서 쓰는 공통 형태로 맞춥니다.
 */

import { Inject, Injectable } from '@nestjs/common';
import { BusinessEntityType, EntityType } from '../../hierarchy/enums/entity-type.enum';
import { CRM_RECORD_REPOSITORY } from '../repositories/crm-record.repository.interface';
import type { ICrmRecordRepository } from '../repositories/crm-record.repository.interface';

/**
 * 폴더 계층 관점의 엔티티 요약
 */
export interface CrmEntitySummary {
  entityType: BusinessEntityType;
  entityId: string;
  /** 엔티티 폴더 표시 이름 */
  folderName: string;
  /** 상위 회사 ID (회사 자신이거나 회사가 없으면 null) */
  companyId: string | null;
}

@Injectable()
export class CrmRecordDomainService {
  constructor(
    @Inject(CRM_RECORD_REPOSITORY)
    private readonly crmRepository: ICrmRecordRepository,
  ) {}

  /**
   * 엔티티 요약 조회
   * 존재하지 않거나 삭제된 엔티티는 null
   */
  async 요약조회(entityType: BusinessEntityType, entityId: string): Promise<CrmEntitySummary | null> {
    switch (entityType) {
      case EntityType.COMPANY: {
        const company = await this.crmRepository.findCompanyById(entityId);
        if (!company) return null;
        return { entityType, entityId, folderName: company.folderName(), companyId: null };
      }
      case EntityType.LEAD: {
        const lead = await this.crmRepository.findLeadById(entityId);
        if (!lead || lead.isDeleted()) return null;
        return { entityType, entityId, folderName: lead.folderName(), companyId: lead.companyId };
      }
      case EntityType.DEAL: {
        const deal = await this.crmRepository.findDealById(entityId);
        if (!deal) return null;
        return { entityType, entityId, folderName: deal.folderName(), companyId: deal.companyId };
      }
    }
  }
}
