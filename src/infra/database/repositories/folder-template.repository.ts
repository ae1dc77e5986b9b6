/**
 * FolderTemplate Repository 구현체
 */
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import {
  FolderTemplateNodeOrmEntity,
  FolderTemplateOrmEntity,
} from '../entities/folder-template.orm-entity';
import { FolderTemplateMapper } from '../mapper/folder-template.mapper';
import type { IFolderTemplateRepository } from '../../../domain/template/repositories/folder-template.repository.interface';
import {
  FolderTemplateEntity,
  TemplateDefinition,
  TemplateNodeDefinition,
} from '../../../domain/template/entities/folder-template.entity';
import { EntityType } from '../../../domain/hierarchy/enums/entity-type.enum';

@Injectable()
export class FolderTemplateRepository implements IFolderTemplateRepository {
  constructor(
    @InjectRepository(FolderTemplateOrmEntity)
    private readonly repository: Repository<FolderTemplateOrmEntity>,
    private readonly dataSource: DataSource,
  ) {}

  async findActiveTemplates(entityType: EntityType): Promise<FolderTemplateEntity[]> {
    const orms = await this.repository.find({
      where: { entityType, active: true },
      relations: { nodes: true },
      order: { id: 'ASC' },
    });
    return orms.map((orm) => FolderTemplateMapper.toDomain(orm));
  }

  async existsByName(name: string): Promise<boolean> {
    return this.repository.exists({ where: { name } });
  }

  async createTemplate(definition: TemplateDefinition, active: boolean): Promise<FolderTemplateEntity> {
    return this.dataSource.transaction(async (manager) => {
      const template = await manager.getRepository(FolderTemplateOrmEntity).save(
        manager.getRepository(FolderTemplateOrmEntity).create({
          name: definition.name,
          entityType: definition.entityType,
          active,
        }),
      );

      const nodes = await this.saveNodes(manager, template.id, null, definition.nodes);
      template.nodes = nodes;
      return FolderTemplateMapper.toDomain(template);
    });
  }

  /**
   * 부모 노드를 먼저 저장한 뒤 자식 노드를 저장 (깊이 우선)
   */
  private async saveNodes(
    manager: EntityManager,
    templateId: number,
    parentId: number | null,
    definitions: TemplateNodeDefinition[],
  ): Promise<FolderTemplateNodeOrmEntity[]> {
    const nodeRepo = manager.getRepository(FolderTemplateNodeOrmEntity);
    const saved: FolderTemplateNodeOrmEntity[] = [];

    for (const [index, definition] of definitions.entries()) {
      const node = await nodeRepo.save(
        nodeRepo.create({
          templateId,
          name: definition.name,
          order: definition.order ?? index,
          parentId,
        }),
      );
      saved.push(node);

      if (definition.children && definition.children.length > 0) {
        saved.push(...(await this.saveNodes(manager, templateId, node.id, definition.children)));
      }
    }

    return saved;
  }
}
