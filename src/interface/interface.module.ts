import { Module } from '@nestjs/common';
import { BusinessModule } from '../business/business.module';
import { HierarchyController } from './controller/hierarchy/hierarchy.controller';

/**
 * 인터페이스 레이어 통합 모듈
 * 폴더 계층 컨트롤러를 등록합니다.
 */
@Module({
  imports: [BusinessModule],
  controllers: [HierarchyController],
})
export class InterfaceModule {}
