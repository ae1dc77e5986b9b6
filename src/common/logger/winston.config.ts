/**
 * Winston 로거 설정 파일
 *
 * - 민감정보 마스킹: 서비스 계정 키, 토큰 등이 로그에 노출되지 않도록 필터링
 * - 요청 컨텍스트 주입: 각 로그에 traceId, requestId 자동 부착
 * - 파일 로테이션: 일별로 로그 파일을 분리하고, 크기/기간 제한으로 디스크 관리
 * - 환경별 분기: 개발(debug+컬러 콘솔) / 프로덕션(info+JSON)
 */
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { RequestContext } from '../context/request-context';

// ─────────────────────────────────────────────
// 민감정보 마스킹 필터
// ─────────────────────────────────────────────

/**
 * 마스킹 대상 키 목록 (대소문자 무시, 부분 일치)
 */
const sensitiveKeys = [
  'password',
  'token',
  'secret',
  'authorization',
  'private_key',
  'privatekey',
  'assertion',
];

/**
 * 객체를 재귀적으로 순회하며 민감정보를 마스킹 (원본 불변)
 */
export function maskSensitive(value: unknown): unknown {
  if (!value || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map((item) => maskSensitive(item));

  const masked: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    if (sensitiveKeys.some((s) => key.toLowerCase().includes(s))) {
      masked[key] = '***MASKED***';
    } else {
      masked[key] = maskSensitive(inner);
    }
  }
  return masked;
}

// ─────────────────────────────────────────────
// 요청 컨텍스트 자동 주입 포맷
// ─────────────────────────────────────────────

const contextFormat = winston.format((info) => {
  const ctx = RequestContext.get();
  if (ctx) {
    info.traceId = ctx.traceId || 'no-trace';
    info.requestId = ctx.requestId;
  }
  if (info.metadata) {
    info.metadata = maskSensitive(info.metadata);
  }
  return info;
})();

// ─────────────────────────────────────────────
// 포맷 정의
// ─────────────────────────────────────────────

/**
 * 파일/프로덕션 콘솔용 JSON 구조화 포맷
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  contextFormat,
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

/**
 * 개발 환경 콘솔 출력용 포맷
 * 출력 예시: 15:30:00.123 info [HierarchyService][4bf92f35...] Deal folder created
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  contextFormat,
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, traceId, context }) => {
    const trace = typeof traceId === 'string' ? `[${traceId}]` : '';
    const ctx = typeof context === 'string' ? `[${context}]` : '';
    return `${String(timestamp)} ${level} ${ctx}${trace} ${String(message)}`;
  }),
);

// ─────────────────────────────────────────────
// Winston 설정 팩토리 함수
// ─────────────────────────────────────────────

/**
 * Winston 로거 설정 객체 생성
 *
 * @param logDir - 로그 파일 디렉토리 (기본값: 'logs')
 */
export function createWinstonConfig(logDir = 'logs'): winston.LoggerOptions {
  const isProduction = process.env.NODE_ENV === 'production';

  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: isProduction ? 'info' : 'debug',
      format: isProduction ? jsonFormat : consoleFormat,
    }),
    // 전체 로그 (14일 보관)
    new DailyRotateFile({
      dirname: logDir,
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      level: 'info',
      format: jsonFormat,
    }),
    // 에러 전용 (30일 보관)
    new DailyRotateFile({
      dirname: logDir,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      level: 'error',
      format: jsonFormat,
    }),
  ];

  return {
    transports,
    exceptionHandlers: [
      new DailyRotateFile({
        dirname: logDir,
        filename: 'exceptions-%DATE%.log',
        datePattern: 'YYYY-MM-DD',
        maxFiles: '7d',
        format: jsonFormat,
      }),
    ],
  };
}
