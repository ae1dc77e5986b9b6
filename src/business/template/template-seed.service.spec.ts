import { Test } from '@nestjs/testing';
import { EntityType } from '../../domain/hierarchy';
import { FOLDER_TEMPLATE_REPOSITORY, FolderTemplateDomainService } from '../../domain/template';
import { InMemoryFolderTemplateRepository } from '../../test/fakes/in-memory-folder-template.repository';
import { defaultTemplateFor } from '../../test/template-fixtures';
import { TemplateSeedService } from './template-seed.service';

/**
 * ============================================================
 * 📦 기본 템플릿 시드 서비스 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - TemplateSeedService.onModuleInit / seed
 *
 * 📋 비즈니스 맥락:
 *   - 애플리케이션 시작 시 회사, 리드, 딜의 기본 폴더 템플릿이 없으면 만들어 둔다.
 *   - 운영자가 이미 활성 템플릿을 지정한 유형은 건드리지 않는다.
 *
 * ⚠️ 중요 고려사항:
 *   - 템플릿 이름은 전역 유일이므로 비활성 상태의 같은 이름 템플릿이 있으면 생성하지 않는다.
 * ============================================================
 */
describe('TemplateSeedService', () => {
  let templates: InMemoryFolderTemplateRepository;
  let service: TemplateSeedService;

  beforeEach(async () => {
    templates = new InMemoryFolderTemplateRepository();

    const module = await Test.createTestingModule({
      providers: [
        TemplateSeedService,
        FolderTemplateDomainService,
        { provide: FOLDER_TEMPLATE_REPOSITORY, useValue: templates },
      ],
    }).compile();

    service = module.get(TemplateSeedService);
  });

  it('시작 시 세 가지 기본 템플릿을 활성 상태로 만들어야 한다', async () => {
    // 🎬 WHEN
    await service.onModuleInit();

    // ✅ THEN
    expect(templates.templates.map((t) => [t.name, t.entityType, t.active, t.nodes.length])).toEqual([
      ['Company Default', EntityType.COMPANY, true, 5],
      ['Lead Default', EntityType.LEAD, true, 6],
      ['Deal Default', EntityType.DEAL, true, 9],
    ]);
  });

  it('다시 실행해도 템플릿을 추가로 만들지 않아야 한다', async () => {
    // 📥 GIVEN
    const definitions = [defaultTemplateFor(EntityType.COMPANY), defaultTemplateFor(EntityType.DEAL)];
    await service.seed(definitions);

    // 🎬 WHEN
    const result = await service.seed(definitions);

    // ✅ THEN
    expect(result).toEqual({ created: [], skipped: ['Company Default', 'Deal Default'] });
    expect(templates.templates).toHaveLength(2);
  });

  it('이미 활성 템플릿이 있는 유형은 건너뛰어야 한다', async () => {
    // 📥 GIVEN
    await templates.createTemplate({ name: 'Lead Custom', entityType: EntityType.LEAD, nodes: [{ name: 'Docs' }] }, true);

    // 🎬 WHEN
    const result = await service.seed([defaultTemplateFor(EntityType.LEAD)]);

    // ✅ THEN
    expect(result).toEqual({ created: [], skipped: ['Lead Default'] });
  });

  it('같은 이름의 비활성 템플릿이 있으면 생성하지 않고 건너뛰어야 한다', async () => {
    // 📥 GIVEN
    await templates.createTemplate({ ...defaultTemplateFor(EntityType.DEAL) }, false);

    // 🎬 WHEN
    const result = await service.seed([defaultTemplateFor(EntityType.DEAL)]);

    // ✅ THEN
    expect(result).toEqual({ created: [], skipped: ['Deal Default'] });
    expect(templates.templates).toHaveLength(1);
  });
});
