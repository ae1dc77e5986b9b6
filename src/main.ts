import 'reflect-metadata';
import { Logger, LoggerService, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/exceptions/global-exception.filter';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Winston 로거를 NestJS 기본 로거로 교체
  const winstonLogger = app.get<LoggerService>(WINSTON_MODULE_NEST_PROVIDER);
  app.useLogger(winstonLogger);

  // 전역 유효성 검증 파이프 설정
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true, // 자동 타입 변환 활성화
      whitelist: true,
    }),
  );

  // 전역 예외 필터 등록
  app.useGlobalFilters(new GlobalExceptionFilter(winstonLogger));

  // 종료 시그널에서 Redis 연결 등 정리
  app.enableShutdownHooks();

  // Swagger 설정
  const config = new DocumentBuilder()
    .setTitle('Drive Hierarchy API')
    .setDescription('CRM 엔티티 폴더 계층 및 템플릿 API 문서')
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-docs', app, document, {
    swaggerOptions: {
      tagsSorter: 'alpha',
      operationsSorter: 'alpha',
    },
  });

  const port = process.env.PORT ?? 3000;
  await app.listen(port);

  const logger = new Logger('Main');
  logger.log(`🚀 App server running on http://localhost:${port}`);
  logger.log(`📚 Swagger docs at http://localhost:${port}/api-docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Main').error(`Bootstrap failed: ${error instanceof Error ? error.stack : String(error)}`);
  process.exit(1);
});
