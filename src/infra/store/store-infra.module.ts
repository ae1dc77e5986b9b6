/**
 * 폴더 저장소 인프라 모듈
 * 환경 설정에 따라 폴더 저장소 어댑터를 주입합니다.
 *
 * 환경변수:
 * - FOLDER_STORE_TYPE: 'memory' | 'google-drive' (기본값: 'memory')
 * - DRIVE_ROOT_FOLDER_ID: 인메모리 저장소의 루트 폴더 ID (기본값: 'root')
 * - GOOGLE_SERVICE_ACCOUNT_JSON: 서비스 계정 키 JSON (google-drive 필수)
 */

import { Module, Logger } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { FOLDER_STORE_PORT } from '../../domain/storage/ports/folder-store.port';
import { GoogleDriveFolderStoreAdapter } from './google-drive/google-drive-folder-store.adapter';
import {
  GoogleServiceAccountTokenProvider,
  parseServiceAccountKey,
} from './google-drive/google-service-account-token.provider';
import { InMemoryFolderStoreAdapter } from './memory/in-memory-folder-store.adapter';

/**
 * 폴더 저장소 타입
 */
export type FolderStoreType = 'memory' | 'google-drive';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: FOLDER_STORE_PORT,
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('StoreInfraModule');
        const storeType = configService.get<FolderStoreType>('FOLDER_STORE_TYPE', 'memory');

        logger.log(`Initializing folder store adapter: ${storeType}`);

        switch (storeType) {
          case 'google-drive': {
            const rawKey = configService.get<string>('GOOGLE_SERVICE_ACCOUNT_JSON');
            if (!rawKey) {
              throw new Error('GOOGLE_SERVICE_ACCOUNT_JSON is required when FOLDER_STORE_TYPE=google-drive');
            }
            const tokenProvider = new GoogleServiceAccountTokenProvider(parseServiceAccountKey(rawKey), new JwtService());
            return new GoogleDriveFolderStoreAdapter(tokenProvider);
          }
          case 'memory':
          default:
            return new InMemoryFolderStoreAdapter(configService.get<string>('DRIVE_ROOT_FOLDER_ID', 'root'));
        }
      },
      inject: [ConfigService],
    },
  ],
  exports: [FOLDER_STORE_PORT],
})
export class StoreInfraModule {}
