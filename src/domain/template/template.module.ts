import { Module, forwardRef } from '@nestjs/common';
import { RepositoryModule } from '../../infra/database/repository.module';
import { FolderTemplateDomainService } from './service/folder-template-domain.service';

/**
 * 폴더 템플릿 도메인 모듈
 */
@Module({
  imports: [forwardRef(() => RepositoryModule)],
  providers: [FolderTemplateDomainService],
  exports: [FolderTemplateDomainService],
})
export class TemplateDomainModule {}
