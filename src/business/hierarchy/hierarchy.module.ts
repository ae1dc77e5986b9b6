import { Module } from '@nestjs/common';
import { CrmDomainModule } from '../../domain/crm';
import { HierarchyDomainModule } from '../../domain/hierarchy';
import { StorageDomainModule } from '../../domain/storage';
import { TemplateBusinessModule } from '../template/template.module';
import { EntityDriveService } from './entity-drive.service';
import { HierarchyService } from './hierarchy.service';
import { MappingReconcileScheduler } from './mapping-reconcile.scheduler';

/**
 * 폴더 계층 비즈니스 모듈
 * 구조 보장/복구, 폴더명 동기화, 매핑 정리, 엔티티 폴더 접근을 제공합니다.
 */
@Module({
  imports: [HierarchyDomainModule, CrmDomainModule, StorageDomainModule, TemplateBusinessModule],
  providers: [HierarchyService, EntityDriveService, MappingReconcileScheduler],
  exports: [HierarchyService, EntityDriveService, MappingReconcileScheduler],
})
export class HierarchyBusinessModule {}
