import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { FolderTemplateDomainService, TemplateDefinition } from '../../domain/template';
import defaultTemplates from './default-templates.json';
import { parseTemplateDefinitions } from './template-definition.parser';

/**
 * 시드 결과
 */
export interface TemplateSeedResult {
  created: string[];
  skipped: string[];
}

/**
 * 기본 폴더 템플릿 시드 서비스
 *
 * 애플리케이션 시작 시 엔티티 유형별 활성 템플릿이 없으면 기본 템플릿을 만듭니다.
 * 이미 활성 템플릿이 있는 유형은 건드리지 않습니다.
 */
@Injectable()
export class TemplateSeedService implements OnModuleInit {
  private readonly logger = new Logger(TemplateSeedService.name);

  constructor(private readonly templateDomainService: FolderTemplateDomainService) {}

  async onModuleInit(): Promise<void> {
    const result = await this.seed(parseTemplateDefinitions(defaultTemplates));
    this.logger.log(`Template seed finished: created=[${result.created.join(', ')}], skipped=[${result.skipped.join(', ')}]`);
  }

  /**
   * 누락된 템플릿만 생성
   */
  async seed(definitions: TemplateDefinition[]): Promise<TemplateSeedResult> {
    const result: TemplateSeedResult = { created: [], skipped: [] };

    for (const definition of definitions) {
      // 1. 같은 유형의 활성 템플릿이 있으면 건너뜀
      const active = await this.templateDomainService.활성템플릿조회(definition.entityType);
      if (active) {
        this.logger.debug(`Active template for ${definition.entityType} exists: "${active.name}"`);
        result.skipped.push(definition.name);
        continue;
      }

      // 2. 같은 이름의 (비활성) 템플릿이 있으면 이름 유일성 때문에 만들 수 없음
      if (await this.templateDomainService.이름존재확인(definition.name)) {
        this.logger.warn(`Template "${definition.name}" exists but is inactive; ${definition.entityType} has no active template`);
        result.skipped.push(definition.name);
        continue;
      }

      // 3. 생성
      await this.templateDomainService.생성(definition, true);
      this.logger.log(`Seeded template "${definition.name}" for ${definition.entityType}`);
      result.created.push(definition.name);
    }

    return result;
  }
}
