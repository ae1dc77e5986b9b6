/**
 * FolderMapping Repository 구현체
 * TypeORM을 사용한 폴더 매핑 리포지토리
 */
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, QueryFailedError, Repository } from 'typeorm';
import { FolderMappingOrmEntity } from '../entities/folder-mapping.orm-entity';
import { FolderMappingMapper } from '../mapper/folder-mapping.mapper';
import type {
  IFolderMappingRepository,
  MappingInsertResult,
} from '../../../domain/hierarchy/repositories/folder-mapping.repository.interface';
import { FolderMappingEntity } from '../../../domain/hierarchy/entities/folder-mapping.entity';
import { EntityType } from '../../../domain/hierarchy/enums/entity-type.enum';

/** PostgreSQL unique_violation */
const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

@Injectable()
export class FolderMappingRepository implements IFolderMappingRepository {
  constructor(
    @InjectRepository(FolderMappingOrmEntity)
    private readonly repository: Repository<FolderMappingOrmEntity>,
  ) {}

  async insert(mapping: FolderMappingEntity): Promise<MappingInsertResult> {
    try {
      await this.repository.insert(FolderMappingMapper.toOrm(mapping));
      return { status: 'inserted', mapping };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'conflict' };
      }
      throw error;
    }
  }

  async findByEntity(entityType: EntityType, entityId: string): Promise<FolderMappingEntity | null> {
    const orm = await this.repository.findOne({
      where: { entityType, entityId, deletedAt: IsNull() },
    });
    return orm ? FolderMappingMapper.toDomain(orm) : null;
  }

  async findByEntityIncludingDeleted(entityType: EntityType, entityId: string): Promise<FolderMappingEntity[]> {
    const orms = await this.repository.find({
      where: { entityType, entityId },
      order: { createdAt: 'DESC' },
    });
    return orms.map((orm) => FolderMappingMapper.toDomain(orm));
  }

  async findAllLive(entityTypes?: EntityType[]): Promise<FolderMappingEntity[]> {
    const orms = await this.repository.find({
      where: {
        deletedAt: IsNull(),
        ...(entityTypes && entityTypes.length > 0 ? { entityType: In(entityTypes) } : {}),
      },
      order: { createdAt: 'ASC' },
    });
    return orms.map((orm) => FolderMappingMapper.toDomain(orm));
  }

  async saveDeletion(mapping: FolderMappingEntity): Promise<void> {
    await this.repository.update(
      { id: mapping.id },
      {
        deletedAt: mapping.deletedAt,
        deletedBy: mapping.deletedBy,
        deleteReason: mapping.deleteReason,
      },
    );
  }
}
