/**
 * 폴더 매핑 대상 엔티티 유형
 */
export enum EntityType {
  COMPANY = 'company',
  LEAD = 'lead',
  DEAL = 'deal',
  /** "Companies" 최상위 폴더 (고정 sentinel ID로 매핑) */
  SYSTEM_ROOT = 'system_root',
}

/**
 * 외부에서 직접 지정할 수 있는 엔티티 유형 (system_root 제외)
 */
export type BusinessEntityType = EntityType.COMPANY | EntityType.LEAD | EntityType.DEAL;

export const BUSINESS_ENTITY_TYPES: readonly BusinessEntityType[] = [
  EntityType.COMPANY,
  EntityType.LEAD,
  EntityType.DEAL,
];

export function isBusinessEntityType(value: string): value is BusinessEntityType {
  return BUSINESS_ENTITY_TYPES.some((type) => type === value);
}

export function isEntityType(value: string): value is EntityType {
  return Object.values(EntityType).some((type) => type === value);
}
