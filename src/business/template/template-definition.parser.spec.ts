import { parseTemplateDefinitions } from './template-definition.parser';

describe('parseTemplateDefinitions', () => {
  it('중첩 노드와 순서를 포함한 정의를 변환해야 한다', () => {
    const definitions = parseTemplateDefinitions([
      {
        name: 'Deal Mini',
        entityType: 'deal',
        nodes: [{ name: ' Jurídico ', order: 3, children: [{ name: 'Contratos' }] }],
      },
    ]);

    expect(definitions).toEqual([
      {
        name: 'Deal Mini',
        entityType: 'deal',
        nodes: [
          {
            name: 'Jurídico',
            order: 3,
            children: [{ name: 'Contratos', order: undefined, children: [] }],
          },
        ],
      },
    ]);
  });

  it('nodes 가 없으면 빈 배열로 처리해야 한다', () => {
    expect(parseTemplateDefinitions([{ name: 'Empty', entityType: 'company' }])).toEqual([
      { name: 'Empty', entityType: 'company', nodes: [] },
    ]);
  });

  it('배열이 아니면 실패해야 한다', () => {
    expect(() => parseTemplateDefinitions({ name: 'x' })).toThrow('Template definitions must be an array');
  });

  it('지원하지 않는 엔티티 유형이면 경로를 포함해 실패해야 한다', () => {
    expect(() => parseTemplateDefinitions([{ name: 'Root', entityType: 'system_root', nodes: [] }])).toThrow(
      '[0].entityType must be one of company, lead, deal',
    );
  });

  it('노드 이름이 비어 있으면 경로를 포함해 실패해야 한다', () => {
    expect(() =>
      parseTemplateDefinitions([
        { name: 'Deal', entityType: 'deal', nodes: [{ name: 'A', children: [{ name: '   ' }] }] },
      ]),
    ).toThrow('[0].nodes[0].children[0].name must be a non-empty string');
  });

  it('order 가 정수가 아니면 실패해야 한다', () => {
    expect(() =>
      parseTemplateDefinitions([{ name: 'Deal', entityType: 'deal', nodes: [{ name: 'A', order: 1.5 }] }]),
    ).toThrow('[0].nodes[0].order must be an integer');
  });
});
