import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { positiveIntSetting } from './utils/settings';
import { ConfiguredIoAdapter } from './logic/socket-gateway/configured-io.adapter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);

  const corsOrigin = configService.get<string>('CORS_ORIGIN', 'http://localhost:5173');
  app.enableCors({
    origin: corsOrigin,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Origin', 'Accept'],
    credentials: true,
    optionsSuccessStatus: 200,
  });
  app.useWebSocketAdapter(new ConfiguredIoAdapter(app, corsOrigin));
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const port = positiveIntSetting(configService, 'PORT', 8787);
  await app.listen(port);
  Logger.log(`Listening on ${port}`, 'Bootstrap');
}

bootstrap().catch(error => {
  Logger.error('Failed to start', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
