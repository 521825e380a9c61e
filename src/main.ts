import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Environment, parseOrigins } from './config/configuration';
import { CorsIoAdapter } from './logic/chat/cors-io.adapter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get<ConfigService<Environment, true>>(ConfigService);
  const origins = parseOrigins(configService.get('CORS_ORIGINS', { infer: true }));

  app.useWebSocketAdapter(new CorsIoAdapter(app, origins));
  app.enableCors({
    origin: origins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Origin', 'Accept'],
    credentials: true,
    optionsSuccessStatus: 200,
  });
  app.enableShutdownHooks();

  const port = configService.get('PORT', { infer: true });
  await app.listen(port);
  Logger.log(`listening on port ${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(`bootstrap failed: ${error instanceof Error ? error.stack : String(error)}`, 'Bootstrap');
  process.exit(1);
});
