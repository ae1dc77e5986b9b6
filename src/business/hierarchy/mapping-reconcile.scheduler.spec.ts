import { EntityType } from '../../domain/hierarchy';
import { createHierarchyTestContext, HierarchyTestContext } from '../../test/hierarchy-test.module';
import { RECONCILE_ACTOR, RECONCILE_REASON_MISSING, RECONCILE_REASON_TRASHED } from './hierarchy.constants';

/**
 * ============================================================
 * 📦 폴더 매핑 정리 스케줄러 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - MappingReconcileScheduler.reconcile / handleCron
 *
 * 📋 비즈니스 맥락:
 *   - 외부 저장소에서 삭제되었거나 휴지통으로 옮겨진 폴더의 매핑을 소프트 삭제해
 *     다음 ensureStructure 호출이 새 폴더를 만들 수 있게 한다.
 *
 * ⚠️ 중요 고려사항:
 *   - 저장소 오류로 상태를 확인하지 못한 매핑은 삭제하지 않는다.
 *   - cron 실행은 MAPPING_RECONCILE_ENABLED=true 일 때만 동작한다.
 * ============================================================
 */
describe('MappingReconcileScheduler', () => {
  let ctx: HierarchyTestContext;

  beforeEach(async () => {
    ctx = await createHierarchyTestContext();
    ctx.crm.addCompany('C1', 'Acme').addDeal('D1', 'Torre Azul', 'C1').addLead('L1', 'Avulso', null);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await ctx.module.close();
  });

  it('사라진 폴더와 휴지통 폴더의 매핑을 각각의 사유로 삭제해야 한다', async () => {
    // 📥 GIVEN
    const deal = await ctx.hierarchyService.ensureStructure(EntityType.DEAL, 'D1');
    const lead = await ctx.hierarchyService.ensureStructure(EntityType.LEAD, 'L1');
    ctx.store.trashItem(deal.externalFolderId);
    ctx.store.removeItem(lead.externalFolderId);

    // 🎬 WHEN
    const result = await ctx.scheduler.reconcile();

    // ✅ THEN
    expect(result).toMatchObject({ checked: 4, retiredMissing: 1, retiredTrashed: 1, failed: 0 });
    expect(ctx.mappings.countLive(EntityType.DEAL, 'D1')).toBe(0);
    expect(ctx.mappings.countLive(EntityType.LEAD, 'L1')).toBe(0);
    expect(ctx.mappings.countLive(EntityType.COMPANY, 'C1')).toBe(1);

    const retiredDeal = ctx.mappings.rows.find((r) => r.entityType === EntityType.DEAL);
    expect(retiredDeal).toMatchObject({ deletedBy: RECONCILE_ACTOR, deleteReason: RECONCILE_REASON_TRASHED });
    const retiredLead = ctx.mappings.rows.find((r) => r.entityType === EntityType.LEAD);
    expect(retiredLead).toMatchObject({ deletedBy: RECONCILE_ACTOR, deleteReason: RECONCILE_REASON_MISSING });
  });

  it('정리된 엔티티는 다음 ensureStructure 에서 새 폴더를 받아야 한다', async () => {
    // 📥 GIVEN
    const before = await ctx.hierarchyService.ensureStructure(EntityType.DEAL, 'D1');
    ctx.store.removeItem(before.externalFolderId);
    await ctx.scheduler.reconcile();

    // 🎬 WHEN
    const after = await ctx.hierarchyService.ensureStructure(EntityType.DEAL, 'D1');

    // ✅ THEN
    expect(after.externalFolderId).not.toBe(before.externalFolderId);
    expect(await ctx.store.getItem(after.externalFolderId)).not.toBeNull();
  });

  it('저장소 조회가 실패한 매핑은 삭제하지 않고 실패로 집계해야 한다', async () => {
    // 📥 GIVEN
    await ctx.hierarchyService.ensureStructure(EntityType.COMPANY, 'C1');
    ctx.store.injectFailure('getItem', new Error('ETIMEDOUT'), 2);

    // 🎬 WHEN
    const result = await ctx.scheduler.reconcile();

    // ✅ THEN
    expect(result).toMatchObject({ checked: 2, retiredMissing: 0, retiredTrashed: 0, failed: 1 });
    expect(ctx.mappings.countLive(EntityType.SYSTEM_ROOT, '00000000-0000-0000-0000-000000000001')).toBe(1);
    expect(ctx.mappings.countLive(EntityType.COMPANY, 'C1')).toBe(1);
  });

  it('이미 실행 중이면 null 을 반환해야 한다', async () => {
    await ctx.hierarchyService.ensureStructure(EntityType.COMPANY, 'C1');

    const [first, second] = await Promise.all([ctx.scheduler.reconcile(), ctx.scheduler.reconcile()]);

    expect(first).toMatchObject({ checked: 2 });
    expect(second).toBeNull();
  });

  describe('handleCron', () => {
    it('비활성화 상태에서는 정리를 실행하지 않아야 한다', async () => {
      const reconcileSpy = jest.spyOn(ctx.scheduler, 'reconcile');

      await ctx.scheduler.handleCron();

      expect(reconcileSpy).not.toHaveBeenCalled();
    });

    it('MAPPING_RECONCILE_ENABLED=true 이면 정리를 실행해야 한다', async () => {
      // 📥 GIVEN
      const enabled = await createHierarchyTestContext({ MAPPING_RECONCILE_ENABLED: 'true' });
      const reconcileSpy = jest.spyOn(enabled.scheduler, 'reconcile');

      // 🎬 WHEN
      await enabled.scheduler.handleCron();

      // ✅ THEN
      expect(reconcileSpy).toHaveBeenCalledTimes(1);
      await enabled.module.close();
    });
  });
});
