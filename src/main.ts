import 'reflect-metadata';
import { spawn } from 'child_process';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { APP_CONFIG } from './config/app.config';
import { getErrorMessage } from './sync/sync.errors';

const BROWSER_COMMANDS: Partial<Record<NodeJS.Platform, [string, string[]]>> = {
  win32: ['cmd', ['/c', 'start', '']],
  darwin: ['open', []],
};

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  // Option fields sent next to the uploads are checked against SyncOptionsDto.
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );

  await app.listen(APP_CONFIG.port);

  const uploadUiUrl = `http://localhost:${APP_CONFIG.port}/sync/upload-ui`;
  logger.log(`Stock sync listening on port ${APP_CONFIG.port}, upload page at ${uploadUiUrl}`);

  if (APP_CONFIG.openUiOnStart) {
    openUploadPage(uploadUiUrl, logger);
  }
}

function openUploadPage(url: string, logger: Logger): void {
  const [command, args] = BROWSER_COMMANDS[process.platform] ?? ['xdg-open', []];
  const onFailure = (error: unknown): void =>
    logger.warn(`Could not open a browser (${getErrorMessage(error)}); visit ${url}`);

  try {
    const child = spawn(command, [...args, url], { detached: true, stdio: 'ignore' });
    child.on('error', onFailure);
    child.unref();
  } catch (error: unknown) {
    onFailure(error);
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.stack ?? error.message : String(error)}`,
  );
  process.exit(1);
});
