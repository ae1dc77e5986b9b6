/**
 * 계층 도메인 모듈 내보내기
 */

export * from './enums/entity-type.enum';
export * from './entities/folder-mapping.entity';

export type { IFolderMappingRepository, MappingInsertResult } from './repositories/folder-mapping.repository.interface';
export { FOLDER_MAPPING_REPOSITORY } from './repositories/folder-mapping.repository.interface';

export * from './service/folder-mapping-domain.service';
export * from './hierarchy.module';
