import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import * as crypto from 'crypto';
import { RequestContext } from '../context/request-context';

/**
 * 단일 값 헤더 추출 (배열이면 첫 번째 값)
 */
function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  if (!value) return undefined;
  return Array.isArray(value) ? value[0] : value;
}

/**
 * 타임스탬프 기반 Trace-ID 생성
 *
 * 타임스탬프(8바이트) + 랜덤(8바이트) = 32자 hex 문자열
 */
function generateTraceId(): string {
  const timestampBuffer = Buffer.allocUnsafe(8);
  timestampBuffer.writeBigUInt64BE(BigInt(Date.now()), 0);
  return Buffer.concat([timestampBuffer, crypto.randomBytes(8)]).toString('hex');
}

/**
 * RequestContextMiddleware
 *
 * 모든 HTTP 요청에 대해 요청 ID / Trace-ID / 호출 주체를 설정합니다.
 * 게이트웨이가 x-trace-id를 넘겨주면 그대로 사용합니다.
 */
@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const requestId = uuidv4();
    const traceId = headerValue(req, 'x-trace-id') ?? generateTraceId();

    res.setHeader('X-Request-Id', requestId);
    res.setHeader('X-Trace-Id', traceId);

    RequestContext.run(
      {
        requestId,
        traceId,
        actorId: headerValue(req, 'x-actor-id'),
        startTime: Date.now(),
      },
      () => next(),
    );
  }
}
