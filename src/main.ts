import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.enableShutdownHooks();
  configureApp(app);

  const port = process.env.PORT || 3000;
  await app.listen(port);

  Logger.log(`Classroom booking API listening on http://localhost:${port}`, 'Bootstrap');
}
void bootstrap();
