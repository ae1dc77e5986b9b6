import { Module } from '@nestjs/common';
import { CacheInfraModule } from '../../infra/cache/cache-infra.module';
import { StoreInfraModule } from '../../infra/store/store-infra.module';
import { FolderStoreDomainService } from './service/folder-store-domain.service';

/**
 * 저장소 도메인 모듈
 * 외부 폴더 저장소와 목록 캐시를 묶은 도메인 서비스를 제공합니다.
 */
@Module({
  imports: [StoreInfraModule, CacheInfraModule],
  providers: [FolderStoreDomainService],
  exports: [FolderStoreDomainService],
})
export class StorageDomainModule {}
