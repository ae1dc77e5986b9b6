import { HttpException } from '@nestjs/common';
import { ErrorCodeDefinition } from './error-codes';

/**
 * 비즈니스 예외 클래스
 *
 * 에러 코드 정의와 디버깅용 컨텍스트를 함께 담습니다.
 * `retryable` 은 외부 저장소 장애처럼 호출자가 다시 시도할 수 있는 오류에만 true 입니다.
 */
export class BusinessException extends HttpException {
  readonly errorCode: number;

  readonly internalCode: string;

  readonly retryable: boolean;

  /** 로그에만 기록, 응답에는 포함되지 않음 */
  readonly context?: Record<string, unknown>;

  constructor(
    errorDef: ErrorCodeDefinition,
    context?: Record<string, unknown>,
    messageOverride?: string,
  ) {
    const message = messageOverride || errorDef.defaultMessage;
    super(
      {
        errorCode: errorDef.code,
        internalCode: errorDef.internalCode,
        message,
      },
      errorDef.httpStatus,
    );

    this.errorCode = errorDef.code;
    this.internalCode = errorDef.internalCode;
    this.retryable = errorDef.retryable ?? false;
    this.context = context;
  }

  static of(
    errorDef: ErrorCodeDefinition,
    context?: Record<string, unknown>,
    messageOverride?: string,
  ): BusinessException {
    return new BusinessException(errorDef, context, messageOverride);
  }

  /**
   * 예외를 생성하고 즉시 throw
   */
  static throw(
    errorDef: ErrorCodeDefinition,
    context?: Record<string, unknown>,
    messageOverride?: string,
  ): never {
    throw new BusinessException(errorDef, context, messageOverride);
  }

  /**
   * 주어진 값이 특정 에러 코드의 BusinessException 인지 확인
   */
  static is(error: unknown, errorDef: ErrorCodeDefinition): error is BusinessException {
    return error instanceof BusinessException && error.errorCode === errorDef.code;
  }
}
