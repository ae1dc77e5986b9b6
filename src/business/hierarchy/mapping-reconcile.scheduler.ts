import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { FolderMappingDomainService } from '../../domain/hierarchy';
import { FolderStoreDomainService } from '../../domain/storage';
import {
  RECONCILE_ACTOR,
  RECONCILE_REASON_MISSING,
  RECONCILE_REASON_TRASHED,
} from './hierarchy.constants';

/**
 * 정리 결과
 */
export interface MappingReconcileResult {
  /** 확인한 활성 매핑 수 */
  checked: number;
  /** 외부 폴더가 사라져 삭제 처리한 매핑 수 */
  retiredMissing: number;
  /** 외부 폴더가 휴지통에 있어 삭제 처리한 매핑 수 */
  retiredTrashed: number;
  /** 저장소 오류로 판단하지 못한 매핑 수 */
  failed: number;
  durationMs: number;
}

/**
 * 폴더 매핑 정리 스케줄러
 *
 * 매시간 활성 매핑의 외부 폴더 상태를 확인해, 사라졌거나 휴지통에 들어간 폴더의
 * 매핑을 소프트 삭제합니다. 다음 ensureStructure 호출이 새 폴더를 만들게 됩니다.
 *
 * 환경변수:
 * - MAPPING_RECONCILE_ENABLED: 'true' 일 때만 cron 실행 (기본값: false)
 */
@Injectable()
export class MappingReconcileScheduler {
  private readonly logger = new Logger(MappingReconcileScheduler.name);
  private readonly enabled: boolean;
  private isRunning = false;

  constructor(
    private readonly mappingDomainService: FolderMappingDomainService,
    private readonly folderStoreDomainService: FolderStoreDomainService,
    configService: ConfigService,
  ) {
    this.enabled = String(configService.get('MAPPING_RECONCILE_ENABLED', 'false')) === 'true';
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleCron(): Promise<void> {
    if (!this.enabled) {
      return;
    }
    await this.reconcile();
  }

  /**
   * 매핑 정리 실행 (이미 실행 중이면 null)
   */
  async reconcile(): Promise<MappingReconcileResult | null> {
    if (this.isRunning) {
      this.logger.warn('Mapping reconcile already running, skipping');
      return null;
    }

    this.isRunning = true;
    const startTime = Date.now();
    const result: MappingReconcileResult = {
      checked: 0,
      retiredMissing: 0,
      retiredTrashed: 0,
      failed: 0,
      durationMs: 0,
    };

    try {
      const mappings = await this.mappingDomainService.활성목록조회();

      for (const mapping of mappings) {
        result.checked++;
        try {
          const folder = await this.folderStoreDomainService.항목조회(mapping.externalFolderId);

          if (!folder) {
            await this.mappingDomainService.삭제(mapping, RECONCILE_ACTOR, RECONCILE_REASON_MISSING);
            result.retiredMissing++;
            this.logger.warn(`Retired ${mapping.entityType}:${mapping.entityId}: folder ${mapping.externalFolderId} missing`);
          } else if (folder.trashed) {
            await this.mappingDomainService.삭제(mapping, RECONCILE_ACTOR, RECONCILE_REASON_TRASHED);
            result.retiredTrashed++;
            this.logger.warn(`Retired ${mapping.entityType}:${mapping.entityId}: folder ${mapping.externalFolderId} trashed`);
          }
        } catch (error) {
          result.failed++;
          this.logger.error(
            `Reconcile failed for ${mapping.entityType}:${mapping.entityId}: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
      }
    } finally {
      result.durationMs = Date.now() - startTime;
      this.isRunning = false;
    }

    this.logger.log(
      `Mapping reconcile done: checked=${result.checked}, missing=${result.retiredMissing}, ` +
        `trashed=${result.retiredTrashed}, failed=${result.failed} (${result.durationMs}ms)`,
    );
    return result;
  }
}
