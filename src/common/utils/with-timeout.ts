/**
 * 제한 시간 내에 끝나지 않은 비동기 작업을 실패로 처리하는 유틸리티
 *
 * 원래 작업 자체를 취소하지는 않습니다. 호출자는 타임아웃 이후에도
 * 원격 쪽에서 작업이 완료되었을 수 있음을 전제해야 합니다.
 *
 * @example
 * const children = await withTimeout(store.listChildren(id), 10_000, 'listChildren');
 */
export class OperationTimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new OperationTimeoutError(label, timeoutMs)), timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
