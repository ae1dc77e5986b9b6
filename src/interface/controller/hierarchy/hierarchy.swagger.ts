/**
 * Hierarchy Controller Swagger 데코레이터
 */
import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import { BUSINESS_ENTITY_TYPES } from '../../../domain/hierarchy';
import {
  EntityFolderListingResponseDto,
  FolderMappingResponseDto,
  HierarchyActionResponseDto,
  MappingReconcileResponseDto,
  StoreItemDto,
} from './dto/hierarchy-response.dto';
import { RetireMappingRequestDto } from './dto/hierarchy-request.dto';

const ApiEntityParams = () =>
  applyDecorators(
    ApiParam({ name: 'entityType', enum: [...BUSINESS_ENTITY_TYPES], description: '엔티티 유형' }),
    ApiParam({ name: 'entityId', description: 'CRM 엔티티 ID' }),
  );

const ApiStoreErrors = () =>
  applyDecorators(
    ApiResponse({ status: 404, description: '엔티티 없음 (4001)' }),
    ApiResponse({ status: 503, description: '외부 저장소 장애 (6001) 또는 쓰기 결과 불명 (6002), 재시도 가능' }),
  );

/**
 * 폴더 구조 보장 API 문서
 */
export const ApiEnsureStructure = () =>
  applyDecorators(
    ApiOperation({
      summary: '엔티티 폴더 보장',
      description: `
엔티티의 폴더가 없으면 상위 폴더(Companies / 회사 / 구조 폴더)를 확보한 뒤 만들고, 활성 템플릿을 적용합니다.
이미 매핑이 있으면 아무것도 만들지 않고 기존 매핑을 반환합니다.
      `,
    }),
    ApiEntityParams(),
    ApiResponse({ status: 200, type: FolderMappingResponseDto }),
    ApiStoreErrors(),
  );

/**
 * 구조 복구 API 문서
 */
export const ApiRepairStructure = () =>
  applyDecorators(
    ApiOperation({
      summary: '템플릿 폴더 복구',
      description: '매핑된 폴더에 템플릿을 다시 적용해 외부에서 삭제된 하위 폴더만 새로 만듭니다.',
    }),
    ApiEntityParams(),
    ApiResponse({ status: 200, type: HierarchyActionResponseDto, description: 'changed=false 면 활성 템플릿 없음' }),
    ApiStoreErrors(),
  );

/**
 * 폴더명 동기화 API 문서
 */
export const ApiSyncFolderName = () =>
  applyDecorators(
    ApiOperation({ summary: '폴더명 동기화', description: '엔티티의 현재 표시 이름으로 매핑된 폴더 이름을 변경합니다.' }),
    ApiEntityParams(),
    ApiResponse({ status: 200, type: HierarchyActionResponseDto }),
    ApiResponse({ status: 404, description: '매핑된 폴더가 저장소에 없음 (6003)' }),
  );

/**
 * 매핑 삭제 API 문서
 */
export const ApiRetireMapping = () =>
  applyDecorators(
    ApiOperation({
      summary: '매핑 소프트 삭제',
      description: '매핑을 삭제 상태로 표시합니다. 외부 폴더는 그대로 남고, 다음 보장 호출은 새 폴더를 만듭니다.',
    }),
    ApiEntityParams(),
    ApiBody({ type: RetireMappingRequestDto }),
    ApiResponse({ status: 200, type: FolderMappingResponseDto }),
    ApiResponse({ status: 404, description: '활성 매핑 없음 (4003)' }),
  );

/**
 * 엔티티 폴더 목록 API 문서
 */
export const ApiListEntityFolder = () =>
  applyDecorators(
    ApiOperation({ summary: '엔티티 폴더 목록', description: '폴더가 없으면 먼저 만든 뒤 하위 항목을 반환합니다.' }),
    ApiEntityParams(),
    ApiResponse({ status: 200, type: EntityFolderListingResponseDto }),
    ApiStoreErrors(),
  );

/**
 * 파일 업로드 API 문서
 */
export const ApiUploadEntityFile = () =>
  applyDecorators(
    ApiOperation({ summary: '엔티티 폴더에 파일 업로드' }),
    ApiEntityParams(),
    ApiConsumes('multipart/form-data'),
    ApiBody({
      schema: {
        type: 'object',
        required: ['file'],
        properties: {
          file: { type: 'string', format: 'binary', description: '업로드할 파일' },
        },
      },
    }),
    ApiResponse({ status: 201, type: StoreItemDto }),
    ApiStoreErrors(),
  );

/**
 * 매핑 정리 API 문서
 */
export const ApiReconcileMappings = () =>
  applyDecorators(
    ApiOperation({
      summary: '매핑 정리 실행',
      description: '외부 폴더가 사라졌거나 휴지통에 있는 매핑을 소프트 삭제합니다. 이미 실행 중이면 skipped=true.',
    }),
    ApiResponse({ status: 200, type: MappingReconcileResponseDto }),
  );
