import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * 요청 컨텍스트 데이터
 */
export interface RequestContextData {
  requestId: string;
  traceId?: string;
  /** 호출 주체 (x-actor-id 헤더, 없으면 undefined) */
  actorId?: string;
  startTime: number;
}

/**
 * RequestContext
 *
 * AsyncLocalStorage를 사용하여 요청별 컨텍스트 관리
 * - 요청 ID, 트레이스 ID를 로그에 자동 부착하기 위해 사용
 * - 스케줄러처럼 HTTP 요청 밖에서 실행되는 코드는 컨텍스트가 없을 수 있음
 */
export class RequestContext {
  private static storage = new AsyncLocalStorage<RequestContextData>();

  /**
   * 새로운 컨텍스트로 실행
   */
  static run<T>(data: Partial<RequestContextData>, fn: () => T): T {
    const contextData: RequestContextData = {
      requestId: data.requestId || uuidv4(),
      traceId: data.traceId,
      actorId: data.actorId,
      startTime: data.startTime || Date.now(),
    };
    return this.storage.run(contextData, fn);
  }

  /**
   * 현재 컨텍스트 조회
   */
  static get(): RequestContextData | undefined {
    return this.storage.getStore();
  }

  /**
   * 현재 트레이스 ID 조회
   */
  static getTraceId(): string | undefined {
    return this.get()?.traceId;
  }

  /**
   * 현재 호출 주체 조회 (없으면 'system')
   */
  static getActorId(): string {
    return this.get()?.actorId || 'system';
  }

  /**
   * 요청 소요 시간 계산 (ms)
   */
  static getDurationMs(): number {
    return Date.now() - (this.get()?.startTime || Date.now());
  }
}
