import { ApiProperty } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { BUSINESS_ENTITY_TYPES, BusinessEntityType } from '../../../../domain/hierarchy';

/**
 * 엔티티 경로 파라미터 DTO
 * `/v1/hierarchy/:entityType/:entityId/...`
 */
export class EntityParamsDto {
  @ApiProperty({ description: '엔티티 유형', enum: [...BUSINESS_ENTITY_TYPES], example: 'deal' })
  @IsIn([...BUSINESS_ENTITY_TYPES])
  entityType!: BusinessEntityType;

  @ApiProperty({ description: 'CRM 엔티티 ID', example: 'a3f1c9e2-7d4b-4c1a-9f0e-2b6d8e5a1c3f' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  entityId!: string;
}

/**
 * 매핑 삭제 요청 DTO
 */
export class RetireMappingRequestDto {
  @ApiProperty({ description: '삭제 사유', example: 'entity_merged' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  reason!: string;
}
