import { Module, forwardRef } from '@nestjs/common';
import { RepositoryModule } from '../../infra/database/repository.module';
import { FolderMappingDomainService } from './service/folder-mapping-domain.service';

/**
 * 계층(폴더 매핑) 도메인 모듈
 */
@Module({
  imports: [forwardRef(() => RepositoryModule)],
  providers: [FolderMappingDomainService],
  exports: [FolderMappingDomainService],
})
export class HierarchyDomainModule {}
