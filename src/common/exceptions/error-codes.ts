/**
 * 에러 코드 정의
 *
 * 도메인별로 숫자 코드 범위를 할당합니다:
 * - 4000~4999: Hierarchy/Mapping 도메인
 * - 6000~6999: Folder Store (외부 저장소)
 * - 9000~9999: System/Other
 */

/**
 * 에러 코드 정의 인터페이스
 */
export interface ErrorCodeDefinition {
  /** 숫자 에러 코드 */
  code: number;
  /** 내부 식별자 (영문 대문자) */
  internalCode: string;
  /** HTTP 상태 코드 */
  httpStatus: number;
  /** 기본 메시지 (한국어) */
  defaultMessage: string;
  /** 호출자가 재시도해도 되는 일시적 오류인지 여부 */
  retryable?: boolean;
}

/**
 * 에러 코드 상수
 */
export const ErrorCodes = {
  // Hierarchy 도메인 (4000~4999)
  HIERARCHY_ENTITY_NOT_FOUND: {
    code: 4001,
    internalCode: 'HIERARCHY_ENTITY_NOT_FOUND',
    httpStatus: 404,
    defaultMessage: '대상 엔티티를 찾을 수 없습니다.',
  },

  HIERARCHY_UNSUPPORTED_ENTITY_TYPE: {
    code: 4002,
    internalCode: 'HIERARCHY_UNSUPPORTED_ENTITY_TYPE',
    httpStatus: 400,
    defaultMessage: '지원하지 않는 엔티티 유형입니다.',
  },

  HIERARCHY_MAPPING_NOT_FOUND: {
    code: 4003,
    internalCode: 'HIERARCHY_MAPPING_NOT_FOUND',
    httpStatus: 404,
    defaultMessage: '엔티티에 연결된 폴더 매핑이 없습니다.',
  },

  HIERARCHY_MAPPING_CONFLICT_UNRESOLVED: {
    code: 4004,
    internalCode: 'HIERARCHY_MAPPING_CONFLICT_UNRESOLVED',
    httpStatus: 500,
    defaultMessage: '폴더 매핑 충돌 후 기존 매핑을 다시 읽지 못했습니다.',
  },

  HIERARCHY_ROOT_NOT_CONFIGURED: {
    code: 4005,
    internalCode: 'HIERARCHY_ROOT_NOT_CONFIGURED',
    httpStatus: 500,
    defaultMessage: '최상위 드라이브 폴더가 설정되지 않았습니다.',
  },

  // Folder Store (6000~6999)
  STORE_UNAVAILABLE: {
    code: 6001,
    internalCode: 'STORE_UNAVAILABLE',
    httpStatus: 503,
    defaultMessage: '외부 저장소에 연결할 수 없습니다. 잠시 후 다시 시도해주세요.',
    retryable: true,
  },

  STORE_WRITE_AMBIGUOUS: {
    code: 6002,
    internalCode: 'STORE_WRITE_AMBIGUOUS',
    httpStatus: 503,
    defaultMessage: '외부 저장소 쓰기 결과를 확인할 수 없습니다. 잠시 후 다시 시도해주세요.',
    retryable: true,
  },

  STORE_ITEM_NOT_FOUND: {
    code: 6003,
    internalCode: 'STORE_ITEM_NOT_FOUND',
    httpStatus: 404,
    defaultMessage: '외부 저장소에서 항목을 찾을 수 없습니다.',
  },

  // System (9000~9999)
  UNKNOWN_ERROR: {
    code: 9999,
    internalCode: 'UNKNOWN_ERROR',
    httpStatus: 500,
    defaultMessage: '알 수 없는 오류가 발생했습니다.',
  },
} as const satisfies Record<string, ErrorCodeDefinition>;
