import { OperationTimeoutError, withTimeout } from './with-timeout';

/**
 * withTimeout 유틸리티 테스트
 *
 * 주요 테스트 시나리오:
 * 1. 제한 시간 내 완료된 작업은 결과를 그대로 전달
 * 2. 제한 시간 초과 시 OperationTimeoutError
 * 3. 원래 작업의 실패는 그대로 전파
 */
describe('withTimeout', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('제한 시간 내에 끝난 작업의 결과를 반환해야 한다', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 1000, 'read')).resolves.toBe('ok');
  });

  it('제한 시간을 넘기면 OperationTimeoutError로 실패해야 한다', async () => {
    // 📥 GIVEN
    const never = new Promise<string>(() => undefined);

    // 🎬 WHEN
    const result = withTimeout(never, 500, 'listChildren');
    jest.advanceTimersByTime(500);

    // ✅ THEN
    await expect(result).rejects.toBeInstanceOf(OperationTimeoutError);
    await expect(result).rejects.toThrow('listChildren timed out after 500ms');
  });

  it('원래 작업의 에러를 그대로 전파해야 한다', async () => {
    const failing = Promise.reject(new Error('boom'));

    await expect(withTimeout(failing, 1000, 'write')).rejects.toThrow('boom');
  });

  it('timeoutMs가 0 이하이면 제한 없이 원래 Promise를 반환해야 한다', () => {
    const promise = Promise.resolve(1);

    expect(withTimeout(promise, 0, 'noop')).toBe(promise);
  });
});
