/**
 * CRM 기록 조회 리포지토리 인터페이스 (읽기 전용)
 */

import { CompanyRecord, DealRecord, LeadRecord } from '../entities/crm-record.entity';

export interface ICrmRecordRepository {
  findCompanyById(id: string): Promise<CompanyRecord | null>;

  /**
   * 소프트 삭제된 리드도 반환하며, 판단은 호출자가 합니다.
   */
  findLeadById(id: string): Promise<LeadRecord | null>;

  findDealById(id: string): Promise<DealRecord | null>;
}

export const CRM_RECORD_REPOSITORY = Symbol('CRM_RECORD_REPOSITORY');
