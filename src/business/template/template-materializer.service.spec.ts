import type { StoreItem } from '../../domain/storage';
import { EntityType } from '../../domain/hierarchy';
import { createHierarchyTestContext, HierarchyTestContext } from '../../test/hierarchy-test.module';
import { activateDefaultTemplates } from '../../test/template-fixtures';

/**
 * ============================================================
 * 📦 템플릿 적용 비즈니스 서비스 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - TemplateMaterializerService.applyTemplate
 *
 * 📋 비즈니스 맥락:
 *   - 엔티티 폴더 아래에 활성 템플릿의 폴더 트리를 만든다.
 *   - 이미 같은 이름의 폴더가 있으면 재사용하므로 여러 번 적용해도 결과가 같다.
 *
 * ⚠️ 중요 고려사항:
 *   - 중간에 실패해도 다시 적용하면 남은 노드만 생성되어 수렴해야 한다.
 * ============================================================
 */
describe('TemplateMaterializerService', () => {
  let ctx: HierarchyTestContext;
  let target: StoreItem;

  beforeEach(async () => {
    ctx = await createHierarchyTestContext();
    target = await ctx.store.createFolder('Deal - Alvo', 'root');
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await ctx.module.close();
  });

  it('활성 템플릿의 모든 노드를 생성해야 한다', async () => {
    // 📥 GIVEN
    await activateDefaultTemplates(ctx.templates, EntityType.DEAL);

    // 🎬 WHEN
    const result = await ctx.materializer.applyTemplate(EntityType.DEAL, target.id);

    // ✅ THEN
    expect(result).toEqual({ templateId: 1, templateName: 'Deal Default', created: 9, reused: 0 });
    expect(ctx.store.findFolders(target.id, '00. Administração do Deal')).toHaveLength(1);
  });

  it('두 번째 적용은 모든 폴더를 재사용해야 한다', async () => {
    // 📥 GIVEN
    await activateDefaultTemplates(ctx.templates, EntityType.DEAL);
    await ctx.materializer.applyTemplate(EntityType.DEAL, target.id);

    // 🎬 WHEN
    const result = await ctx.materializer.applyTemplate(EntityType.DEAL, target.id);

    // ✅ THEN
    expect(result).toMatchObject({ created: 0, reused: 9 });
    expect(ctx.store.countFolders()).toBe(10);
  });

  it('앞뒤 공백만 다른 기존 폴더를 재사용해야 한다', async () => {
    // 📥 GIVEN
    await activateDefaultTemplates(ctx.templates, EntityType.DEAL);
    await ctx.store.createFolder('  04. Comercial ', target.id);

    // 🎬 WHEN
    const result = await ctx.materializer.applyTemplate(EntityType.DEAL, target.id);

    // ✅ THEN
    expect(result).toMatchObject({ created: 8, reused: 1 });
    expect(ctx.store.findFolders(target.id, '04. Comercial')).toHaveLength(0);
  });

  it('폴더는 노드에 적힌 이름 그대로 만들고, 다시 적용하면 공백을 무시하고 재사용해야 한다', async () => {
    // 📥 GIVEN
    await ctx.templates.createTemplate(
      { name: 'Lead Padded', entityType: EntityType.LEAD, nodes: [{ name: ' 01. Qualificação ' }] },
      true,
    );

    // 🎬 WHEN
    const first = await ctx.materializer.applyTemplate(EntityType.LEAD, target.id);
    const second = await ctx.materializer.applyTemplate(EntityType.LEAD, target.id);

    // ✅ THEN
    expect(first).toMatchObject({ created: 1, reused: 0 });
    expect(second).toMatchObject({ created: 0, reused: 1 });
    expect(ctx.store.findFolders(target.id, ' 01. Qualificação ')).toHaveLength(1);
    expect(ctx.store.findFolders(target.id, '01. Qualificação')).toHaveLength(0);
  });

  it('하위 노드는 부모 노드 폴더 아래에 만들고, 같은 이름이 여럿이면 첫 번째 폴더를 사용해야 한다', async () => {
    // 📥 GIVEN
    await ctx.templates.createTemplate(
      {
        name: 'Company Nested',
        entityType: EntityType.COMPANY,
        nodes: [{ name: 'Jurídico', children: [{ name: 'Contratos' }, { name: 'Procurações' }] }, { name: 'Fiscal' }],
      },
      true,
    );
    const firstJuridico = await ctx.store.createFolder('Jurídico', target.id);
    await ctx.store.createFolder('Jurídico', target.id);

    // 🎬 WHEN
    const result = await ctx.materializer.applyTemplate(EntityType.COMPANY, target.id);

    // ✅ THEN
    expect(result).toMatchObject({ created: 3, reused: 1 });
    expect(ctx.store.findFolders(firstJuridico.id, 'Contratos')).toHaveLength(1);
    expect(ctx.store.findFolders(firstJuridico.id, 'Procurações')).toHaveLength(1);
  });

  it('노드 순서(order)대로 폴더를 생성해야 한다', async () => {
    // 📥 GIVEN
    await ctx.templates.createTemplate(
      {
        name: 'Lead Ordered',
        entityType: EntityType.LEAD,
        nodes: [
          { name: 'Último', order: 2 },
          { name: 'Primeiro', order: 0 },
          { name: 'Segundo', order: 1 },
        ],
      },
      true,
    );
    const createSpy = jest.spyOn(ctx.store, 'createFolder');

    // 🎬 WHEN
    await ctx.materializer.applyTemplate(EntityType.LEAD, target.id);

    // ✅ THEN
    expect(createSpy.mock.calls.map(([name]) => name)).toEqual(['Primeiro', 'Segundo', 'Último']);
  });

  it('활성 템플릿이 없으면 null 을 반환하고 폴더를 만들지 않아야 한다', async () => {
    const result = await ctx.materializer.applyTemplate(EntityType.LEAD, target.id);

    expect(result).toBeNull();
    expect(ctx.store.countFolders()).toBe(1);
  });

  it('중간에 실패한 뒤 다시 적용하면 남은 노드만 생성해야 한다', async () => {
    // 📥 GIVEN
    await activateDefaultTemplates(ctx.templates, EntityType.DEAL);
    const createFolder = ctx.store.createFolder.bind(ctx.store);
    let calls = 0;
    const createSpy = jest.spyOn(ctx.store, 'createFolder').mockImplementation(async (name, parentId) => {
      calls++;
      if (calls === 5) {
        throw new Error('socket hang up');
      }
      return createFolder(name, parentId);
    });

    await expect(ctx.materializer.applyTemplate(EntityType.DEAL, target.id)).rejects.toMatchObject({
      errorCode: 6001,
    });
    expect(ctx.store.countFolders()).toBe(1 + 4);
    createSpy.mockRestore();

    // 🎬 WHEN
    const result = await ctx.materializer.applyTemplate(EntityType.DEAL, target.id);

    // ✅ THEN
    expect(result).toMatchObject({ created: 5, reused: 4 });
    expect(ctx.store.countFolders()).toBe(1 + 9);
  });
});
