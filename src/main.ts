import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { WsAdapter } from '@nestjs/platform-ws';
import { AppModule } from './app.module';
import { NotificationWorkerLoop } from './modules/notification/application/worker/notification-worker.loop';
import { NOTIFICATIONS_PATH } from './modules/realtime/notification.gateway';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  const logger = new Logger('Bootstrap');

  app.useWebSocketAdapter(new WsAdapter(app));
  app.enableShutdownHooks();
  app.setGlobalPrefix('api');

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Notification Dispatch')
    .setDescription(
      `Operational endpoints. Live in-app notifications are served over WebSocket at ${NOTIFICATIONS_PATH}.`,
    )
    .setVersion('1.0')
    .addTag('health', 'Liveness and queue depth')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, document);

  const port = configService.getOrThrow<number>('PORT');
  await app.listen(port, '0.0.0.0');

  logger.log(`Environment: ${configService.get<string>('NODE_ENV')}`);
  logger.log(`API running on http://localhost:${port}/api`);
  logger.log(`Live notifications at ws://localhost:${port}${NOTIFICATIONS_PATH}`);

  if (configService.get<boolean>('NOTIFICATION_WORKER_EMBEDDED')) {
    app.get(NotificationWorkerLoop).start();
    logger.log('Embedded notification worker started');
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
