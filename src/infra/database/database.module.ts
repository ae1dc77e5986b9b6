/**
 * 데이터베이스 모듈
 * TypeORM을 사용하여 PostgreSQL 연결을 설정합니다.
 *
 * 환경변수:
 * - DB_HOST: 데이터베이스 호스트 (기본값: 'localhost')
 * - DB_PORT: 데이터베이스 포트 (기본값: 5432)
 * - DB_USERNAME: 데이터베이스 사용자 (기본값: 'postgres')
 * - DB_PASSWORD: 데이터베이스 비밀번호 (기본값: 'postgres')
 * - DB_DATABASE: 데이터베이스 이름 (기본값: 'drive_hierarchy')
 * - DB_SYNCHRONIZE: 스키마 자동 동기화 (기본값: false, 개발용으로만 true)
 */

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  CompanyOrmEntity,
  DealOrmEntity,
  FolderMappingOrmEntity,
  FolderTemplateNodeOrmEntity,
  FolderTemplateOrmEntity,
  LeadOrmEntity,
} from './entities';

/**
 * 등록된 모든 ORM 엔티티
 */
export const ormEntities = [
  // 폴더 계층
  FolderMappingOrmEntity,
  FolderTemplateOrmEntity,
  FolderTemplateNodeOrmEntity,
  // CRM (읽기 전용)
  CompanyOrmEntity,
  LeadOrmEntity,
  DealOrmEntity,
];

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: Number(configService.get('DB_PORT', 5432)),
        username: configService.get<string>('DB_USERNAME', 'postgres'),
        password: configService.get<string>('DB_PASSWORD', 'postgres'),
        database: configService.get<string>('DB_DATABASE', 'drive_hierarchy'),
        autoLoadEntities: true,
        synchronize: String(configService.get('DB_SYNCHRONIZE', 'false')) === 'true',
        logging: configService.get<string>('NODE_ENV') === 'development',
      }),
      inject: [ConfigService],
    }),
    TypeOrmModule.forFeature(ormEntities),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
