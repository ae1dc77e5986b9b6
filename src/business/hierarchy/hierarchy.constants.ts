import { EntityType } from '../../domain/hierarchy';

/**
 * "Companies" 최상위 폴더를 가리키는 system_root 매핑의 고정 엔티티 ID
 */
export const COMPANIES_ROOT_ENTITY_ID = '00000000-0000-0000-0000-000000000001';

export const COMPANIES_ROOT_FOLDER_NAME = 'Companies';

/**
 * 회사 폴더와 리드/딜 폴더 사이의 구조 폴더 이름
 */
export const STRUCTURAL_FOLDER_NAMES = {
  [EntityType.LEAD]: '01. Leads',
  [EntityType.DEAL]: '02. Deals',
} as const;

/**
 * 매핑 정리 스케줄러가 남기는 삭제 정보
 */
export const RECONCILE_ACTOR = 'system';
export const RECONCILE_REASON_MISSING = 'reconciled_missing';
export const RECONCILE_REASON_TRASHED = 'reconciled_trash';
