/**
 * 템플릿 도메인 모듈 내보내기
 */

export * from './entities/folder-template.entity';
export type { IFolderTemplateRepository } from './repositories/folder-template.repository.interface';
export { FOLDER_TEMPLATE_REPOSITORY } from './repositories/folder-template.repository.interface';
export * from './service/folder-template-domain.service';
export * from './template.module';
