import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { mkdir } from 'fs/promises';
import fastifyCors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import fastifyMultipart from '@fastify/multipart';

import { AppModule } from './app.module';
import { AttachmentExceptionFilter } from './attachments/attachment-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ logger: true }),
  );
  const cfg = app.get(ConfigService);

  const origins = (cfg.get<string>('ORIGINS') ?? '').split(',').filter(Boolean);
  await app.register(fastifyCors, {
    origin: (origin, cb) => cb(null, !origin || origins.includes(origin)),
    credentials: true,
  });

  // one file per request; larger parts fail with 413
  await app.register(fastifyMultipart, {
    limits: { fileSize: cfg.getOrThrow<number>('MAX_UPLOAD_BYTES'), files: 1 },
  });

  // local driver: serve the storage directory under /uploads/*
  if (cfg.get<string>('STORAGE_DRIVER') === 'local') {
    const uploadsDir = resolve(process.cwd(), cfg.getOrThrow<string>('UPLOADS_DIR'));
    await mkdir(uploadsDir, { recursive: true });
    await app.register(fastifyStatic, {
      root: uploadsDir,
      prefix: '/uploads/',
      index: false,
      decorateReply: false,
    });
  }

  app.useGlobalPipes(
    new ValidationPipe({ whitelist: true, transform: true, forbidUnknownValues: true }),
  );
  app.useGlobalFilters(new AttachmentExceptionFilter());

  const port = cfg.getOrThrow<number>('PORT');
  await app.listen({ port, host: '0.0.0.0' });
  new Logger('Bootstrap').log(`listening on :${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error('failed to start', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
