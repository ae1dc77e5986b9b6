import { Module } from '@nestjs/common';
import { TemplateDomainModule } from '../../domain/template';
import { StorageDomainModule } from '../../domain/storage';
import { TemplateMaterializerService } from './template-materializer.service';
import { TemplateSeedService } from './template-seed.service';

/**
 * 템플릿 비즈니스 모듈
 * 템플릿 적용과 기본 템플릿 시드를 제공합니다.
 */
@Module({
  imports: [TemplateDomainModule, StorageDomainModule],
  providers: [TemplateMaterializerService, TemplateSeedService],
  exports: [TemplateMaterializerService],
})
export class TemplateBusinessModule {}
