import {
  FolderTemplateEntity,
  TemplateNodeEntity,
} from '../../../domain/template/entities/folder-template.entity';
import {
  FolderTemplateNodeOrmEntity,
  FolderTemplateOrmEntity,
} from '../entities/folder-template.orm-entity';

export class FolderTemplateMapper {
  static toDomain(orm: FolderTemplateOrmEntity): FolderTemplateEntity {
    return new FolderTemplateEntity({
      id: orm.id,
      name: orm.name,
      entityType: orm.entityType,
      active: orm.active,
      nodes: (orm.nodes ?? []).map((node) => FolderTemplateMapper.nodeToDomain(node)),
      createdAt: orm.createdAt,
    });
  }

  static nodeToDomain(orm: FolderTemplateNodeOrmEntity): TemplateNodeEntity {
    return new TemplateNodeEntity({
      id: orm.id,
      templateId: orm.templateId,
      name: orm.name,
      order: orm.order,
      parentId: orm.parentId,
    });
  }
}
