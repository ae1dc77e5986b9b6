import { ArgumentsHost, BadRequestException, LoggerService, NotFoundException } from '@nestjs/common';
import { BusinessException } from './business.exception';
import { ErrorCodes } from './error-codes';
import { GlobalExceptionFilter } from './global-exception.filter';

/**
 * ============================================================
 * 📦 전역 예외 필터 테스트
 * ============================================================
 *
 * 🎯 테스트 대상:
 *   - GlobalExceptionFilter.catch 의 응답 형식과 로그 레벨
 *
 * 📋 비즈니스 맥락:
 *   - 호출자는 errorCode 와 retryable 로 재시도 여부를 판단한다.
 * ============================================================
 */
describe('GlobalExceptionFilter', () => {
  const logger: jest.Mocked<LoggerService> = {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
  };
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  const host = {
    switchToHttp: () => ({
      getResponse: () => ({ status }),
      getRequest: () => ({ method: 'POST', url: '/v1/hierarchy/deal/D1/ensure', params: { entityType: 'deal' } }),
    }),
  } as unknown as ArgumentsHost;

  let filter: GlobalExceptionFilter;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-01T00:00:00Z'));
    filter = new GlobalExceptionFilter(logger);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('재시도 가능한 비즈니스 예외는 retryable 과 함께 503 으로 응답하고 error 로그를 남겨야 한다', () => {
    // 📥 GIVEN
    const exception = BusinessException.of(ErrorCodes.STORE_UNAVAILABLE, { operation: 'listChildren(f1)' });

    // 🎬 WHEN
    filter.catch(exception, host);

    // ✅ THEN
    expect(status).toHaveBeenCalledWith(503);
    expect(json).toHaveBeenCalledWith({
      statusCode: 503,
      errorCode: 6001,
      message: '외부 저장소에 연결할 수 없습니다. 잠시 후 다시 시도해주세요. [6001]',
      retryable: true,
      timestamp: '2026-03-01T00:00:00.000Z',
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('4xx 비즈니스 예외는 retryable 없이 응답하고 warn 로그를 남겨야 한다', () => {
    filter.catch(BusinessException.of(ErrorCodes.HIERARCHY_ENTITY_NOT_FOUND), host);

    expect(json).toHaveBeenCalledWith({
      statusCode: 404,
      errorCode: 4001,
      message: '대상 엔티티를 찾을 수 없습니다. [4001]',
      timestamp: '2026-03-01T00:00:00.000Z',
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('유효성 검증 실패는 기존 응답 형식을 유지해야 한다', () => {
    filter.catch(new BadRequestException(['entityType must be one of the following values: company, lead, deal']), host);

    expect(json).toHaveBeenCalledWith({
      statusCode: 400,
      message: ['entityType must be one of the following values: company, lead, deal'],
      error: 'Bad Request',
      timestamp: '2026-03-01T00:00:00.000Z',
    });
  });

  it('그 밖의 HttpException 은 상태 코드를 유지해야 한다', () => {
    filter.catch(new NotFoundException('Cannot GET /nope'), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith(expect.objectContaining({ statusCode: 404, message: 'Cannot GET /nope' }));
  });

  it('알 수 없는 예외는 9999 로 응답해야 한다', () => {
    filter.catch(new TypeError('boom'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({
      statusCode: 500,
      errorCode: 9999,
      message: '알 수 없는 오류가 발생했습니다. [9999]',
      timestamp: '2026-03-01T00:00:00.000Z',
    });
  });
});
