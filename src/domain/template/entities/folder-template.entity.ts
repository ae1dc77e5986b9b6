/**
 * 폴더 템플릿 도메인 엔티티
 *
 * 템플릿은 엔티티 폴더 아래에 만들어질 폴더 트리(forest)를 정의합니다.
 * parentId 가 null 인 노드는 엔티티 폴더의 직접 하위 폴더입니다.
 */

import { EntityType } from '../../hierarchy/enums/entity-type.enum';

export interface TemplateNodeProps {
  id: number;
  templateId: number;
  name: string;
  order: number;
  parentId: number | null;
}

export class TemplateNodeEntity {
  id: number;
  templateId: number;
  name: string;
  order: number;
  parentId: number | null;

  constructor(props: TemplateNodeProps) {
    this.id = props.id;
    this.templateId = props.templateId;
    this.name = props.name;
    this.order = props.order;
    this.parentId = props.parentId;
  }

  isRoot(): boolean {
    return this.parentId === null;
  }
}

export interface FolderTemplateProps {
  id: number;
  name: string;
  entityType: EntityType;
  active: boolean;
  nodes: TemplateNodeEntity[];
  createdAt?: Date;
}

export class FolderTemplateEntity {
  id: number;
  name: string;
  entityType: EntityType;
  active: boolean;
  nodes: TemplateNodeEntity[];
  createdAt: Date;

  constructor(props: FolderTemplateProps) {
    this.id = props.id;
    this.name = props.name;
    this.entityType = props.entityType;
    this.active = props.active;
    this.nodes = props.nodes;
    this.createdAt = props.createdAt ?? new Date();
  }

  /**
   * 부모 노드 ID → 자식 노드 목록 인덱스
   * 루트 노드는 null 키, 각 목록은 order 오름차순 (동률이면 id 순)
   */
  buildChildrenIndex(): Map<number | null, TemplateNodeEntity[]> {
    const index = new Map<number | null, TemplateNodeEntity[]>();

    for (const node of this.nodes) {
      const siblings = index.get(node.parentId);
      if (siblings) {
        siblings.push(node);
      } else {
        index.set(node.parentId, [node]);
      }
    }

    for (const siblings of index.values()) {
      siblings.sort((a, b) => a.order - b.order || a.id - b.id);
    }

    return index;
  }
}

/**
 * 템플릿 정의 (시드 및 생성 입력)
 */
export interface TemplateNodeDefinition {
  name: string;
  order?: number;
  children?: TemplateNodeDefinition[];
}

export interface TemplateDefinition {
  name: string;
  entityType: EntityType;
  nodes: TemplateNodeDefinition[];
}
