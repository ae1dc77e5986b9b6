import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { EntityDriveService } from '../business/hierarchy/entity-drive.service';
import { HierarchyService } from '../business/hierarchy/hierarchy.service';
import { MappingReconcileScheduler } from '../business/hierarchy/mapping-reconcile.scheduler';
import { TemplateMaterializerService } from '../business/template/template-materializer.service';
import { TemplateSeedService } from '../business/template/template-seed.service';
import { CRM_RECORD_REPOSITORY, CrmRecordDomainService } from '../domain/crm';
import { FOLDER_MAPPING_REPOSITORY, FolderMappingDomainService } from '../domain/hierarchy';
import { FOLDER_STORE_PORT, FolderStoreDomainService, LISTING_CACHE_PORT } from '../domain/storage';
import { FOLDER_TEMPLATE_REPOSITORY, FolderTemplateDomainService } from '../domain/template';
import { InMemoryListingCacheAdapter } from '../infra/cache/in-memory-listing-cache.adapter';
import { InMemoryFolderStoreAdapter } from '../infra/store/memory/in-memory-folder-store.adapter';
import { InMemoryCrmRecordRepository } from './fakes/in-memory-crm-record.repository';
import { InMemoryFolderMappingRepository } from './fakes/in-memory-folder-mapping.repository';
import { InMemoryFolderTemplateRepository } from './fakes/in-memory-folder-template.repository';

/**
 * 계층 테스트 하네스
 * 실제 비즈니스/도메인 서비스를 프로세스 내 저장소, 캐시, 리포지토리 위에 조립합니다.
 */
export interface HierarchyTestContext {
  module: TestingModule;
  hierarchyService: HierarchyService;
  entityDriveService: EntityDriveService;
  materializer: TemplateMaterializerService;
  seedService: TemplateSeedService;
  scheduler: MappingReconcileScheduler;
  store: InMemoryFolderStoreAdapter;
  cache: InMemoryListingCacheAdapter;
  mappings: InMemoryFolderMappingRepository;
  templates: InMemoryFolderTemplateRepository;
  crm: InMemoryCrmRecordRepository;
}

export async function createHierarchyTestContext(
  config: Record<string, string | number> = {},
): Promise<HierarchyTestContext> {
  const store = new InMemoryFolderStoreAdapter('root');
  const cache = new InMemoryListingCacheAdapter();
  const mappings = new InMemoryFolderMappingRepository();
  const templates = new InMemoryFolderTemplateRepository();
  const crm = new InMemoryCrmRecordRepository();

  const module = await Test.createTestingModule({
    providers: [
      HierarchyService,
      EntityDriveService,
      MappingReconcileScheduler,
      TemplateMaterializerService,
      TemplateSeedService,
      FolderMappingDomainService,
      FolderTemplateDomainService,
      CrmRecordDomainService,
      FolderStoreDomainService,
      { provide: FOLDER_MAPPING_REPOSITORY, useValue: mappings },
      { provide: FOLDER_TEMPLATE_REPOSITORY, useValue: templates },
      { provide: CRM_RECORD_REPOSITORY, useValue: crm },
      { provide: FOLDER_STORE_PORT, useValue: store },
      { provide: LISTING_CACHE_PORT, useValue: cache },
      {
        provide: ConfigService,
        useValue: new ConfigService({ DRIVE_ROOT_FOLDER_ID: 'root', LISTING_CACHE_TTL: 180, ...config }),
      },
    ],
  }).compile();

  return {
    module,
    hierarchyService: module.get(HierarchyService),
    entityDriveService: module.get(EntityDriveService),
    materializer: module.get(TemplateMaterializerService),
    seedService: module.get(TemplateSeedService),
    scheduler: module.get(MappingReconcileScheduler),
    store,
    cache,
    mappings,
    templates,
    crm,
  };
}
