import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { FileInterceptor } from '@nestjs/platform-express';
import { EntityDriveService } from '../../../business/hierarchy/entity-drive.service';
import { HierarchyService } from '../../../business/hierarchy/hierarchy.service';
import { MappingReconcileScheduler } from '../../../business/hierarchy/mapping-reconcile.scheduler';
import { RequestContext } from '../../../common/context/request-context';
import { decodeUploadFileName } from '../../../common/utils/filename.util';
import { EntityParamsDto, RetireMappingRequestDto } from './dto/hierarchy-request.dto';
import {
  EntityFolderListingResponseDto,
  FolderMappingResponseDto,
  HierarchyActionResponseDto,
  MappingReconcileResponseDto,
  StoreItemDto,
} from './dto/hierarchy-response.dto';
import {
  ApiEnsureStructure,
  ApiListEntityFolder,
  ApiReconcileMappings,
  ApiRepairStructure,
  ApiRetireMapping,
  ApiSyncFolderName,
  ApiUploadEntityFile,
} from './hierarchy.swagger';

/**
 * 폴더 계층 컨트롤러
 * 엔티티 폴더 보장, 복구, 이름 동기화, 매핑 삭제, 폴더 목록/업로드 API
 */
@ApiTags('100.폴더 계층')
@Controller('v1/hierarchy')
export class HierarchyController {
  constructor(
    private readonly hierarchyService: HierarchyService,
    private readonly entityDriveService: EntityDriveService,
    private readonly reconcileScheduler: MappingReconcileScheduler,
  ) {}

  /**
   * POST /v1/hierarchy/reconcile - 매핑 정리
   */
  @Post('reconcile')
  @ApiReconcileMappings()
  @HttpCode(HttpStatus.OK)
  async reconcile(): Promise<MappingReconcileResponseDto> {
    return MappingReconcileResponseDto.from(await this.reconcileScheduler.reconcile());
  }

  /**
   * POST /v1/hierarchy/:entityType/:entityId/ensure - 폴더 보장
   */
  @Post(':entityType/:entityId/ensure')
  @ApiEnsureStructure()
  @HttpCode(HttpStatus.OK)
  async ensure(@Param() params: EntityParamsDto): Promise<FolderMappingResponseDto> {
    const mapping = await this.hierarchyService.ensureStructure(params.entityType, params.entityId);
    return FolderMappingResponseDto.from(mapping);
  }

  /**
   * POST /v1/hierarchy/:entityType/:entityId/repair - 템플릿 복구
   */
  @Post(':entityType/:entityId/repair')
  @ApiRepairStructure()
  @HttpCode(HttpStatus.OK)
  async repair(@Param() params: EntityParamsDto): Promise<HierarchyActionResponseDto> {
    const changed = await this.hierarchyService.repairStructure(params.entityType, params.entityId);
    return { changed };
  }

  /**
   * POST /v1/hierarchy/:entityType/:entityId/sync-name - 폴더명 동기화
   */
  @Post(':entityType/:entityId/sync-name')
  @ApiSyncFolderName()
  @HttpCode(HttpStatus.OK)
  async syncName(@Param() params: EntityParamsDto): Promise<HierarchyActionResponseDto> {
    const changed = await this.hierarchyService.syncFolderName(params.entityType, params.entityId);
    return { changed };
  }

  /**
   * DELETE /v1/hierarchy/:entityType/:entityId/mapping - 매핑 소프트 삭제
   */
  @Delete(':entityType/:entityId/mapping')
  @ApiRetireMapping()
  async retire(
    @Param() params: EntityParamsDto,
    @Body() body: RetireMappingRequestDto,
  ): Promise<FolderMappingResponseDto> {
    const mapping = await this.hierarchyService.retireMapping(
      params.entityType,
      params.entityId,
      RequestContext.getActorId(),
      body.reason,
    );
    return FolderMappingResponseDto.from(mapping);
  }

  /**
   * GET /v1/hierarchy/:entityType/:entityId/items - 엔티티 폴더 목록
   */
  @Get(':entityType/:entityId/items')
  @ApiListEntityFolder()
  async listItems(@Param() params: EntityParamsDto): Promise<EntityFolderListingResponseDto> {
    const listing = await this.entityDriveService.listEntityFolder(params.entityType, params.entityId);
    return EntityFolderListingResponseDto.from(listing);
  }

  /**
   * POST /v1/hierarchy/:entityType/:entityId/files - 파일 업로드
   */
  @Post(':entityType/:entityId/files')
  @ApiUploadEntityFile()
  @UseInterceptors(FileInterceptor('file'))
  @HttpCode(HttpStatus.CREATED)
  async upload(
    @Param() params: EntityParamsDto,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<StoreItemDto> {
    if (!file) {
      throw new BadRequestException('file 필드가 필요합니다.');
    }

    const created = await this.entityDriveService.uploadFile(params.entityType, params.entityId, {
      content: file.buffer,
      name: decodeUploadFileName(file.originalname),
      mimeType: file.mimetype || 'application/octet-stream',
    });
    return StoreItemDto.from(created);
  }
}
