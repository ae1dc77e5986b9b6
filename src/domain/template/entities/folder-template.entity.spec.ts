import { EntityType } from '../../hierarchy/enums/entity-type.enum';
import { FolderTemplateEntity, TemplateNodeEntity } from './folder-template.entity';

/**
 * FolderTemplateEntity.buildChildrenIndex 테스트
 *
 * 🎯 테스트 대상: 부모 → 자식 인덱스 구성과 형제 정렬
 */
describe('FolderTemplateEntity', () => {
  const node = (id: number, name: string, order: number, parentId: number | null) =>
    new TemplateNodeEntity({ id, templateId: 1, name, order, parentId });

  it('루트 노드는 null 키로, 하위 노드는 부모 ID 키로 묶여야 한다', () => {
    // 📥 GIVEN
    const template = new FolderTemplateEntity({
      id: 1,
      name: 'Deal Default',
      entityType: EntityType.DEAL,
      active: true,
      nodes: [node(1, 'A', 0, null), node(2, 'A-1', 0, 1), node(3, 'B', 1, null)],
    });

    // 🎬 WHEN
    const index = template.buildChildrenIndex();

    // ✅ THEN
    expect(index.get(null)?.map((n) => n.name)).toEqual(['A', 'B']);
    expect(index.get(1)?.map((n) => n.name)).toEqual(['A-1']);
    expect(index.get(3)).toBeUndefined();
  });

  it('형제 노드는 order 오름차순, 동률이면 id 순으로 정렬되어야 한다', () => {
    const template = new FolderTemplateEntity({
      id: 1,
      name: 'Lead Default',
      entityType: EntityType.LEAD,
      active: true,
      nodes: [node(5, 'third', 2, null), node(4, 'second-b', 1, null), node(3, 'second-a', 1, null), node(9, 'first', 0, null)],
    });

    const names = template.buildChildrenIndex().get(null)?.map((n) => n.name);

    expect(names).toEqual(['first', 'second-a', 'second-b', 'third']);
  });
});
