/**
 * Google 서비스 계정 액세스 토큰 제공자
 *
 * 서비스 계정 키로 RS256 assertion 을 서명해 token_uri 에서 액세스 토큰을 교환하고,
 * 만료 60초 전까지 재사용합니다.
 */

import { Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';

const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
const EXPIRY_MARGIN_MS = 60_000;

export interface ServiceAccountKey {
  client_email: string;
  private_key: string;
  token_uri: string;
}

/**
 * GOOGLE_SERVICE_ACCOUNT_JSON 값 파싱
 */
export function parseServiceAccountKey(raw: string): ServiceAccountKey {
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('client_email' in parsed) ||
    typeof parsed.client_email !== 'string' ||
    !('private_key' in parsed) ||
    typeof parsed.private_key !== 'string'
  ) {
    throw new Error('GOOGLE_SERVICE_ACCOUNT_JSON must contain client_email and private_key');
  }

  const tokenUri = 'token_uri' in parsed && typeof parsed.token_uri === 'string' ? parsed.token_uri : DEFAULT_TOKEN_URI;
  return { client_email: parsed.client_email, private_key: parsed.private_key, token_uri: tokenUri };
}

export class GoogleServiceAccountTokenProvider {
  private readonly logger = new Logger(GoogleServiceAccountTokenProvider.name);
  private cached: { token: string; expiresAt: number } | null = null;

  constructor(
    private readonly key: ServiceAccountKey,
    private readonly jwtService: JwtService = new JwtService(),
  ) {}

  async getAccessToken(): Promise<string> {
    if (this.cached && Date.now() < this.cached.expiresAt - EXPIRY_MARGIN_MS) {
      return this.cached.token;
    }

    const issuedAt = Math.floor(Date.now() / 1000);
    const assertion = await this.jwtService.signAsync(
      {
        iss: this.key.client_email,
        scope: DRIVE_SCOPE,
        aud: this.key.token_uri,
        iat: issuedAt,
        exp: issuedAt + 3600,
      },
      { algorithm: 'RS256', privateKey: this.key.private_key },
    );

    const response = await fetch(this.key.token_uri, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion,
      }),
    });

    if (!response.ok) {
      throw new Error(`Token exchange failed: ${response.status} ${await response.text()}`);
    }

    const body: unknown = await response.json();
    if (
      typeof body !== 'object' ||
      body === null ||
      !('access_token' in body) ||
      typeof body.access_token !== 'string'
    ) {
      throw new Error('Token exchange returned no access_token');
    }

    const expiresIn = 'expires_in' in body && typeof body.expires_in === 'number' ? body.expires_in : 3600;
    this.cached = { token: body.access_token, expiresAt: Date.now() + expiresIn * 1000 };
    this.logger.debug(`Access token refreshed for ${this.key.client_email} (expires in ${expiresIn}s)`);
    return body.access_token;
  }
}
