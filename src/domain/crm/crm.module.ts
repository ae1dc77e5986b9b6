import { Module, forwardRef } from '@nestjs/common';
import { RepositoryModule } from '../../infra/database/repository.module';
import { CrmRecordDomainService } from './service/crm-record-domain.service';

/**
 * CRM 기록 도메인 모듈
 */
@Module({
  imports: [forwardRef(() => RepositoryModule)],
  providers: [CrmRecordDomainService],
  exports: [CrmRecordDomainService],
})
export class CrmDomainModule {}
