import { isBusinessEntityType } from '../../domain/hierarchy';
import { TemplateDefinition, TemplateNodeDefinition } from '../../domain/template';

/**
 * 템플릿 정의 JSON 검증 및 변환
 * 형식이 맞지 않으면 경로를 포함한 메시지로 실패합니다.
 */
export function parseTemplateDefinitions(raw: unknown): TemplateDefinition[] {
  if (!Array.isArray(raw)) {
    throw new Error('Template definitions must be an array');
  }
  return raw.map((entry: unknown, i) => parseTemplate(entry, `[${i}]`));
}

function parseTemplate(value: unknown, path: string): TemplateDefinition {
  if (typeof value !== 'object' || value === null) {
    throw new Error(`${path} must be an object`);
  }
  if (!('name' in value) || typeof value.name !== 'string' || value.name.trim() === '') {
    throw new Error(`${path}.name must be a non-empty string`);
  }
  if (!('entityType' in value) || typeof value.entityType !== 'string' || !isBusinessEntityType(value.entityType)) {
    throw new Error(`${path}.entityType must be one of company, lead, deal`);
  }
  const nodes = 'nodes' in value ? value.nodes : undefined;
  return {
    name: value.name,
    entityType: value.entityType,
    nodes: parseNodes(nodes, `${path}.nodes`),
  };
}

function parseNodes(value: unknown, path: string): TemplateNodeDefinition[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`);
  }

  return value.map((node: unknown, i): TemplateNodeDefinition => {
    const nodePath = `${path}[${i}]`;
    if (typeof node !== 'object' || node === null) {
      throw new Error(`${nodePath} must be an object`);
    }
    if (!('name' in node) || typeof node.name !== 'string' || node.name.trim() === '') {
      throw new Error(`${nodePath}.name must be a non-empty string`);
    }

    let order: number | undefined;
    if ('order' in node && node.order !== undefined) {
      if (typeof node.order !== 'number' || !Number.isInteger(node.order)) {
        throw new Error(`${nodePath}.order must be an integer`);
      }
      order = node.order;
    }

    return {
      name: node.name.trim(),
      order,
      children: parseNodes('children' in node ? node.children : undefined, `${nodePath}.children`),
    };
  });
}
