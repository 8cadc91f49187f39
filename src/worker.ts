import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { WorkerModule } from './worker.module';
import { NotificationWorkerLoop } from './modules/notification/application/worker/notification-worker.loop';
import { parseWorkerArgs, WorkerCliError, WORKER_USAGE } from './worker-cli';

const logger = new Logger('NotificationWorkerCli');

async function main(): Promise<void> {
  const options = parseWorkerArgs(process.argv.slice(2));
  if (options.help) {
    process.stdout.write(WORKER_USAGE);
    return;
  }

  const app = await NestFactory.createApplicationContext(
    WorkerModule.forRoot(options.overrides),
  );
  const loop = app.get(NotificationWorkerLoop);

  if (options.runOnce) {
    try {
      const result = await loop.runOnce();
      logger.log({ message: 'Single batch finished', ...result });
    } finally {
      await app.close();
    }
    return;
  }

  // SIGINT/SIGTERM close the context; the loop lets its batch finish first.
  app.enableShutdownHooks(['SIGINT', 'SIGTERM']);
  loop.start();
}

main().catch((error: unknown) => {
  if (error instanceof WorkerCliError) {
    process.stderr.write(`${error.message}\n\n${WORKER_USAGE}`);
    process.exit(2);
  }
  logger.error(
    'Notification worker failed',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
