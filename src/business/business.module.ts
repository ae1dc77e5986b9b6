import { Module } from '@nestjs/common';
import { HierarchyBusinessModule } from './hierarchy/hierarchy.module';
import { TemplateBusinessModule } from './template/template.module';

/**
 * 비즈니스 레이어 통합 모듈
 * 폴더 계층, 템플릿 비즈니스 모듈을 통합합니다.
 */
@Module({
  imports: [HierarchyBusinessModule, TemplateBusinessModule],
  exports: [HierarchyBusinessModule, TemplateBusinessModule],
})
export class BusinessModule {}
