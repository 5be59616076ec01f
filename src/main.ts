import 'reflect-metadata';
import 'dotenv/config';
import { readFileSync } from 'fs';
import * as path from 'path';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { OpenAPIObject, SwaggerModule } from '@nestjs/swagger';
import yaml from 'js-yaml';
import { AppModule } from './app.module';

function loadOpenApiDocument(): OpenAPIObject {
  const openApiPath = path.join(process.cwd(), 'openapi', 'kitchen-eta.yaml');
  const document = yaml.load(readFileSync(openApiPath, 'utf8'));
  if (!document || typeof document !== 'object' || !('openapi' in document)) {
    throw new Error(`${openApiPath} is not an OpenAPI document.`);
  }
  return document as OpenAPIObject;
}

async function bootstrap() {
  const apiPrefix = 'api/v1';
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
  );
  app.setGlobalPrefix(apiPrefix);
  app.enableShutdownHooks();
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  SwaggerModule.setup('/api/docs', app, loadOpenApiDocument());

  const parsedPort = Number.parseInt(process.env.PORT ?? '3000', 10);
  const port = Number.isFinite(parsedPort) ? parsedPort : 3000;
  await app.listen(port, '0.0.0.0');
  new Logger('Bootstrap').log(`Listening on port ${port}, prefix /${apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
