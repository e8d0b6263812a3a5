import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';

async function bootstrap() {
  // rawBody: webhook signatures are computed over the exact bytes GitHub sent
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const swaggerPath = configService.get<string>('SWAGGER_PATH') ?? 'docs';
  const config = new DocumentBuilder()
    .setTitle('Push Deploy API')
    .setDescription('Deploys GitHub repositories on push or on demand')
    .setVersion('0.1.0')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(swaggerPath, app, document);

  const port = configService.get<number>('PORT') ?? 3000;
  await app.listen(port);
  Logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
