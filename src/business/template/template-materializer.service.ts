import { Injectable, Logger } from '@nestjs/common';
import { EntityType } from '../../domain/hierarchy';
import { FolderTemplateDomainService, TemplateNodeEntity } from '../../domain/template';
import { FolderStoreDomainService, normalizeFolderName } from '../../domain/storage';

/**
 * 템플릿 적용 옵션
 */
export interface ApplyTemplateOptions {
  /** true 면 목록 캐시를 건너뛰고 저장소를 직접 조회 (복구 시 사용) */
  fresh?: boolean;
}

/**
 * 템플릿 적용 결과
 */
export interface TemplateApplyResult {
  templateId: number;
  templateName: string;
  /** 새로 만든 폴더 수 */
  created: number;
  /** 이미 있어서 재사용한 폴더 수 */
  reused: number;
}

type ChildrenIndex = Map<number | null, TemplateNodeEntity[]>;

/**
 * 템플릿 적용(Materialize) 비즈니스 서비스
 *
 * 대상 폴더의 하위 목록을 기준으로 템플릿 노드마다 같은 이름의 폴더가 있으면 재사용하고,
 * 없을 때만 생성합니다. 몇 번을 실행해도 노드 이름당 폴더는 하나로 수렴합니다.
 */
@Injectable()
export class TemplateMaterializerService {
  private readonly logger = new Logger(TemplateMaterializerService.name);

  constructor(
    private readonly templateDomainService: FolderTemplateDomainService,
    private readonly folderStoreDomainService: FolderStoreDomainService,
  ) {}

  /**
   * 엔티티 유형의 활성 템플릿을 대상 폴더 아래에 적용
   *
   * @returns 활성 템플릿이 없으면 null (에러 아님)
   */
  async applyTemplate(
    entityType: EntityType,
    rootFolderId: string,
    options: ApplyTemplateOptions = {},
  ): Promise<TemplateApplyResult | null> {
    const template = await this.templateDomainService.활성템플릿조회(entityType);
    if (!template) {
      this.logger.warn(`No active template for ${entityType}, skipping folder ${rootFolderId}`);
      return null;
    }

    const result: TemplateApplyResult = {
      templateId: template.id,
      templateName: template.name,
      created: 0,
      reused: 0,
    };

    await this.materializeLevel(template.buildChildrenIndex(), null, rootFolderId, result, options);

    this.logger.log(
      `Template "${template.name}" applied to ${rootFolderId}: created=${result.created}, reused=${result.reused}`,
    );
    return result;
  }

  /**
   * 한 단계(형제 노드 묶음)를 대상 폴더 아래에 적용한 뒤 각 노드의 자식으로 내려갑니다.
   * 대상 폴더마다 하위 목록은 한 번만 조회합니다.
   */
  private async materializeLevel(
    index: ChildrenIndex,
    parentNodeId: number | null,
    targetFolderId: string,
    result: TemplateApplyResult,
    options: ApplyTemplateOptions,
  ): Promise<void> {
    const nodes = index.get(parentNodeId);
    if (!nodes || nodes.length === 0) {
      return;
    }

    const children = options.fresh
      ? await this.folderStoreDomainService.하위목록직접조회(targetFolderId)
      : await this.folderStoreDomainService.하위목록조회(targetFolderId);

    // 정규화된 이름 → 폴더 ID (같은 이름이 여럿이면 첫 번째)
    const existing = new Map<string, string>();
    for (const item of children) {
      const key = normalizeFolderName(item.name);
      if (item.kind === 'folder' && !existing.has(key)) {
        existing.set(key, item.id);
      }
    }

    for (const node of nodes) {
      const key = normalizeFolderName(node.name);
      let folderId = existing.get(key);

      if (folderId) {
        result.reused++;
        this.logger.debug(`Reusing "${node.name}" (${folderId}) under ${targetFolderId}`);
      } else {
        const folder = await this.folderStoreDomainService.폴더생성(node.name, targetFolderId);
        folderId = folder.id;
        existing.set(key, folderId);
        result.created++;
      }

      await this.materializeLevel(index, node.id, folderId, result, options);
    }
  }
}
