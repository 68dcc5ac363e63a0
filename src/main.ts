import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    cors: {
      origin: '*',
      methods: 'GET,OPTIONS',
      allowedHeaders: 'Content-Type,Authorization,x-api-key',
    },
  });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();
  const cfg = app.get(ConfigService);
  const port = cfg.get<number>('INSIGHTS_PORT') ?? 8080;
  await app.listen(port);
  new Logger('Bootstrap').log(`browsing insights API listening on ${port}`);
}
bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('failed to start', err instanceof Error ? err.stack : err);
  process.exit(1);
});
