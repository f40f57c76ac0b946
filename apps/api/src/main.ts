import 'reflect-metadata';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { loadConfig } from './config';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(process.cwd(), '../.env') });

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const config = loadConfig(process.env);
  const app = await NestFactory.create(AppModule.forRoot(config), {
    logger: [...config.logLevels],
  });
  app.enableShutdownHooks();
  await app.listen(config.http.port);
  logger.log(`Listening on http://localhost:${config.http.port}`);
}

bootstrap().catch((e: unknown) => {
  logger.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
