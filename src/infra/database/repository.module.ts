/**
 * Repository 모듈
 * 도메인 리포지토리 인터페이스에 대한 TypeORM 구현체를 제공합니다.
 */

import { Module } from '@nestjs/common';
import { DatabaseModule } from './database.module';
import { CrmRecordRepository, FolderMappingRepository, FolderTemplateRepository } from './repositories';

// Repository Tokens (from domain layer)
import { CRM_RECORD_REPOSITORY } from '../../domain/crm/repositories/crm-record.repository.interface';
import { FOLDER_MAPPING_REPOSITORY } from '../../domain/hierarchy/repositories/folder-mapping.repository.interface';
import { FOLDER_TEMPLATE_REPOSITORY } from '../../domain/template/repositories/folder-template.repository.interface';

@Module({
  imports: [DatabaseModule],
  providers: [
    // Folder Mapping Repository
    {
      provide: FOLDER_MAPPING_REPOSITORY,
      useClass: FolderMappingRepository,
    },
    // Folder Template Repository
    {
      provide: FOLDER_TEMPLATE_REPOSITORY,
      useClass: FolderTemplateRepository,
    },
    // CRM Record Repository
    {
      provide: CRM_RECORD_REPOSITORY,
      useClass: CrmRecordRepository,
    },
  ],
  exports: [FOLDER_MAPPING_REPOSITORY, FOLDER_TEMPLATE_REPOSITORY, CRM_RECORD_REPOSITORY],
})
export class RepositoryModule {}
