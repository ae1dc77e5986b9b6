import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { WinstonModule } from 'nest-winston';
import { BusinessModule } from './business/business.module';
import { InterfaceModule } from './interface/interface.module';
import { RepositoryModule } from './infra/database/repository.module';
import { RequestContextMiddleware } from './common/middleware/request-context.middleware';
import { createWinstonConfig } from './common/logger/winston.config';

/**
 * 루트 애플리케이션 모듈
 *
 * DDD 구조:
 * - Domain: 엔티티, 리포지토리/저장소 포트, 도메인 서비스
 * - Business: 구조 보장, 템플릿 적용, 매핑 정리 유스케이스
 * - Interface: HTTP 컨트롤러
 * - Infra: PostgreSQL, 외부 폴더 저장소, 목록 캐시 구현
 */
@Module({
  imports: [
    // 환경변수 설정
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    // Winston 구조화 로깅
    WinstonModule.forRoot(createWinstonConfig(process.env.LOG_DIR || 'logs')),
    // 스케줄링 모듈 (매핑 정리 Cron)
    ScheduleModule.forRoot(),
    // 인프라 레이어
    RepositoryModule,
    // 비즈니스 레이어
    BusinessModule,
    // 인터페이스 레이어
    InterfaceModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    // 모든 요청에 requestId / traceId / actorId 컨텍스트 설정
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
