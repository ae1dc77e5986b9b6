/**
 * 폴더 템플릿 리포지토리 인터페이스
 */

import { EntityType } from '../../hierarchy/enums/entity-type.enum';
import { FolderTemplateEntity, TemplateDefinition } from '../entities/folder-template.entity';

export interface IFolderTemplateRepository {
  /**
   * 엔티티 유형의 활성 템플릿 목록 (노드 포함, id 오름차순)
   */
  findActiveTemplates(entityType: EntityType): Promise<FolderTemplateEntity[]>;

  /**
   * 템플릿 이름 존재 여부
   */
  existsByName(name: string): Promise<boolean>;

  /**
   * 템플릿과 노드 트리 생성 (부모 노드가 먼저 저장됨)
   */
  createTemplate(definition: TemplateDefinition, active: boolean): Promise<FolderTemplateEntity>;
}

export const FOLDER_TEMPLATE_REPOSITORY = Symbol('FOLDER_TEMPLATE_REPOSITORY');
