/**
 * Google Drive 폴더 저장소 어댑터
 * IFolderStorePort의 Google Drive v3 REST 구현체 (FOLDER_STORE_TYPE=google-drive)
 *
 * 공유 드라이브를 지원하도록 모든 요청에 supportsAllDrives 를 붙입니다.
 * 캐시는 이 어댑터가 아닌 FolderStoreDomainService 가 담당합니다.
 */

import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { BusinessException } from '../../../common/exceptions/business.exception';
import { ErrorCodes } from '../../../common/exceptions/error-codes';
import type {
  CreateFileInput,
  IFolderStorePort,
  StoreItem,
} from '../../../domain/storage/ports/folder-store.port';
import { GoogleServiceAccountTokenProvider } from './google-service-account-token.provider';

const FILES_URL = 'https://www.googleapis.com/drive/v3/files';
const UPLOAD_URL = 'https://www.googleapis.com/upload/drive/v3/files';
const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
const FILE_FIELDS = 'id, name, mimeType, parents, webViewLink, size, createdTime, trashed';
const PAGE_SIZE = 1000;

/**
 * Drive v3 files 리소스 (필요한 필드만)
 */
interface DriveFile {
  id: string;
  name: string;
  mimeType: string;
  parents?: string[];
  webViewLink?: string;
  size?: string;
  createdTime?: string;
  trashed?: boolean;
}

interface DriveRequest {
  headers?: Record<string, string>;
  body?: string;
}

function isDriveFile(value: unknown): value is DriveFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'mimeType' in value &&
    typeof value.mimeType === 'string' &&
    (!('parents' in value) || Array.isArray(value.parents))
  );
}

function toStoreItem(file: DriveFile): StoreItem {
  return {
    id: file.id,
    name: file.name,
    kind: file.mimeType === FOLDER_MIME_TYPE ? 'folder' : 'file',
    parentIds: file.parents ?? [],
    url: file.webViewLink,
    size: file.size !== undefined ? Number(file.size) : undefined,
    mimeType: file.mimeType,
    createdAt: file.createdTime,
    trashed: file.trashed ?? false,
  };
}

/**
 * Drive 검색 쿼리 문자열 리터럴 이스케이프
 */
function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export class GoogleDriveFolderStoreAdapter implements IFolderStorePort {
  private readonly logger = new Logger(GoogleDriveFolderStoreAdapter.name);

  constructor(private readonly tokenProvider: GoogleServiceAccountTokenProvider) {
    this.logger.log('GoogleDriveFolderStoreAdapter initialized');
  }

  async createFolder(name: string, parentId: string): Promise<StoreItem> {
    const url = this.buildUrl(FILES_URL, { fields: FILE_FIELDS });
    const file = await this.requestFile('createFolder', parentId, url, 'POST', {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] }),
    });
    return toStoreItem(file);
  }

  async listChildren(folderId: string): Promise<StoreItem[]> {
    const items: StoreItem[] = [];
    let pageToken: string | undefined;

    do {
      const url = this.buildUrl(FILES_URL, {
        q: `'${escapeQueryValue(folderId)}' in parents and trashed = false`,
        fields: `nextPageToken, files(${FILE_FIELDS})`,
        pageSize: String(PAGE_SIZE),
        includeItemsFromAllDrives: 'true',
        ...(pageToken ? { pageToken } : {}),
      });

      const response = await this.authorizedFetch(url, 'GET');
      await this.ensureOk('listChildren', folderId, response);

      const body: unknown = await response.json();
      if (typeof body !== 'object' || body === null || !('files' in body) || !Array.isArray(body.files)) {
        throw new Error('Google Drive listChildren returned an unexpected body');
      }

      for (const file of body.files) {
        if (isDriveFile(file)) items.push(toStoreItem(file));
      }
      pageToken = 'nextPageToken' in body && typeof body.nextPageToken === 'string' ? body.nextPageToken : undefined;
    } while (pageToken);

    return items;
  }

  async createFile(input: CreateFileInput): Promise<StoreItem> {
    const boundary = `drive-hierarchy-${uuidv4()}`;
    const metadata = JSON.stringify({ name: input.name, parents: [input.parentId] });

    // multipart/related: 메타데이터(JSON) + base64 본문
    const body = [
      `--${boundary}`,
      'Content-Type: application/json; charset=UTF-8',
      '',
      metadata,
      `--${boundary}`,
      `Content-Type: ${input.mimeType}`,
      'Content-Transfer-Encoding: base64',
      '',
      input.content.toString('base64'),
      `--${boundary}--`,
    ].join('\r\n');

    const url = this.buildUrl(UPLOAD_URL, { uploadType: 'multipart', fields: FILE_FIELDS });
    const file = await this.requestFile('createFile', input.parentId, url, 'POST', {
      headers: { 'Content-Type': `multipart/related; boundary=${boundary}` },
      body,
    });
    return toStoreItem(file);
  }

  async getItem(itemId: string): Promise<StoreItem | null> {
    const url = this.buildUrl(`${FILES_URL}/${encodeURIComponent(itemId)}`, { fields: FILE_FIELDS });
    const response = await this.authorizedFetch(url, 'GET');
    if (response.status === 404) {
      return null;
    }
    return toStoreItem(await this.parseFile('getItem', itemId, response));
  }

  async renameItem(itemId: string, newName: string): Promise<StoreItem> {
    const url = this.buildUrl(`${FILES_URL}/${encodeURIComponent(itemId)}`, { fields: FILE_FIELDS });
    const response = await this.authorizedFetch(url, 'PATCH', {
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ name: newName }),
    });
    return toStoreItem(await this.parseFile('renameItem', itemId, response));
  }

  // ============================================
  // 내부 헬퍼
  // ============================================

  private buildUrl(base: string, params: Record<string, string>): string {
    const search = new URLSearchParams({ ...params, supportsAllDrives: 'true' });
    return `${base}?${search.toString()}`;
  }

  private async authorizedFetch(url: string, method: string, request: DriveRequest = {}): Promise<Response> {
    const token = await this.tokenProvider.getAccessToken();
    return fetch(url, {
      method,
      headers: { ...request.headers, Authorization: `Bearer ${token}` },
      body: request.body,
    });
  }

  private async requestFile(
    operation: string,
    itemId: string,
    url: string,
    method: string,
    request: DriveRequest,
  ): Promise<DriveFile> {
    const response = await this.authorizedFetch(url, method, request);
    return this.parseFile(operation, itemId, response);
  }

  private async parseFile(operation: string, itemId: string, response: Response): Promise<DriveFile> {
    await this.ensureOk(operation, itemId, response);
    const body: unknown = await response.json();
    if (!isDriveFile(body)) {
      throw new Error(`Google Drive ${operation} returned an unexpected body`);
    }
    return body;
  }

  /**
   * 404 (부모 폴더 또는 항목 없음)는 STORE_ITEM_NOT_FOUND 로 변환합니다.
   */
  private async ensureOk(operation: string, itemId: string, response: Response): Promise<void> {
    if (response.ok) return;
    const detail = await response.text();
    if (response.status === 404) {
      this.logger.warn(`Google Drive ${operation} target not found: ${itemId}`);
      throw BusinessException.of(ErrorCodes.STORE_ITEM_NOT_FOUND, { operation, itemId });
    }
    this.logger.error(`Google Drive ${operation} failed: ${response.status} ${detail}`);
    throw new Error(`Google Drive ${operation} failed: ${response.status} ${response.statusText}`);
  }
}
