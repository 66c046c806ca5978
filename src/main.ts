import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '@/app.module';
import { datasetsConfig, type DatasetsConfig } from '@/config/datasets.config';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true }));
  app.enableShutdownHooks();

  const config = app.get<DatasetsConfig>(datasetsConfig.KEY);
  await app.listen(config.port);
  logger.log(`Servidor ouvindo na porta ${config.port}`);
}

bootstrap().catch((error) => {
  logger.error(`Erro crítico: ${(error as Error).stack}`);
  process.exit(1);
});
