/**
 * CRM 도메인 모듈 내보내기
 */

export * from './entities/crm-record.entity';
export type { ICrmRecordRepository } from './repositories/crm-record.repository.interface';
export { CRM_RECORD_REPOSITORY } from './repositories/crm-record.repository.interface';
export * from './service/crm-record-domain.service';
export * from './crm.module';
