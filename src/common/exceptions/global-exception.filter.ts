import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  Inject,
} from '@nestjs/common';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import type { LoggerService } from '@nestjs/common';
import { Request, Response } from 'express';
import { BusinessException } from './business.exception';
import { ErrorCodes } from './error-codes';

/**
 * 전역 예외 필터
 *
 * - BusinessException → `{ statusCode, errorCode, message: "<msg> [<code>]", retryable?, timestamp }`
 * - 그 외 HttpException → 기존 응답 형식 유지 (ValidationPipe 등)
 * - 알 수 없는 예외 → 9999
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  constructor(
    @Inject(WINSTON_MODULE_NEST_PROVIDER)
    private readonly logger: LoggerService,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const requestInfo = `${request.method} ${request.url}`;

    if (exception instanceof BusinessException) {
      const errorCode = exception.errorCode;
      const httpStatus = exception.getStatus();

      const logMessage =
        `[${requestInfo}] errorCode=${errorCode} internalCode=${exception.internalCode} ` +
        `context=${JSON.stringify(exception.context || {})}`;

      // 5xx 만 error, 4xx 는 warn
      if (httpStatus >= 500) {
        this.logger.error(logMessage, exception.stack, 'GlobalExceptionFilter');
      } else {
        this.logger.warn(logMessage, 'GlobalExceptionFilter');
      }

      response.status(httpStatus).json({
        statusCode: httpStatus,
        errorCode,
        message: `${exception.message} [${errorCode}]`,
        ...(exception.retryable ? { retryable: true } : {}),
        timestamp: new Date().toISOString(),
      });
      return;
    }

    if (exception instanceof HttpException) {
      const httpStatus = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        this.logger.warn(
          `[${requestInfo}] HttpException [${httpStatus}]: ${exceptionResponse}`,
          'GlobalExceptionFilter',
        );
        response.status(httpStatus).json({
          statusCode: httpStatus,
          message: exceptionResponse,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      // ValidationPipe 에러는 필드별 실패 사유 배열을 message 로 가진다
      const validationErrors = 'message' in exceptionResponse ? exceptionResponse.message : undefined;
      if (Array.isArray(validationErrors)) {
        this.logger.warn(
          `[${requestInfo}] 유효성 검증 실패 [${httpStatus}]: ${JSON.stringify(validationErrors)}` +
            ` | params: ${JSON.stringify(request.params)}`,
          'GlobalExceptionFilter',
        );
      } else {
        this.logger.warn(
          `[${requestInfo}] HttpException [${httpStatus}]: ${exception.message}`,
          'GlobalExceptionFilter',
        );
      }

      response.status(httpStatus).json({
        ...exceptionResponse,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    const errorCode = ErrorCodes.UNKNOWN_ERROR.code;
    this.logger.error(
      `[${requestInfo}] 처리되지 않은 예외: errorCode=${errorCode}`,
      exception instanceof Error ? exception.stack : String(exception),
      'GlobalExceptionFilter',
    );

    response.status(ErrorCodes.UNKNOWN_ERROR.httpStatus).json({
      statusCode: ErrorCodes.UNKNOWN_ERROR.httpStatus,
      errorCode,
      message: `${ErrorCodes.UNKNOWN_ERROR.defaultMessage} [${errorCode}]`,
      timestamp: new Date().toISOString(),
    });
  }
}
