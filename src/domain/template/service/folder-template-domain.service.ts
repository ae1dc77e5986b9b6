/**
 * 폴더 템플릿 도메인 서비스
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { EntityType } from '../../hierarchy/enums/entity-type.enum';
import { FolderTemplateEntity, TemplateDefinition } from '../entities/folder-template.entity';
import { FOLDER_TEMPLATE_REPOSITORY } from '../repositories/folder-template.repository.interface';
import type { IFolderTemplateRepository } from '../repositories/folder-template.repository.interface';

@Injectable()
export class FolderTemplateDomainService {
  private readonly logger = new Logger(FolderTemplateDomainService.name);

  constructor(
    @Inject(FOLDER_TEMPLATE_REPOSITORY)
    private readonly templateRepository: IFolderTemplateRepository,
  ) {}

  // ============================================
  // 조회 메서드 (Query Methods)
  // ============================================

  /**
   * 엔티티 유형의 활성 템플릿 조회
   * 활성 템플릿이 여러 개면 id 가 가장 작은 템플릿을 사용합니다.
   */
  async 활성템플릿조회(entityType: EntityType): Promise<FolderTemplateEntity | null> {
    const templates = await this.templateRepository.findActiveTemplates(entityType);
    if (templates.length === 0) {
      return null;
    }

    if (templates.length > 1) {
      this.logger.warn(
        `Multiple active templates for ${entityType}: [${templates.map((t) => t.name).join(', ')}], using "${templates[0].name}"`,
      );
    }
    return templates[0];
  }

  async 이름존재확인(name: string): Promise<boolean> {
    return this.templateRepository.existsByName(name);
  }

  // ============================================
  // 명령 메서드 (Command Methods)
  // ============================================

  /**
   * 템플릿 생성
   */
  async 생성(definition: TemplateDefinition, active = true): Promise<FolderTemplateEntity> {
    return this.templateRepository.createTemplate(definition, active);
  }
}
