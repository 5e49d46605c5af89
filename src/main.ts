import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './config/app.config';
import { ProviderFaultFilter } from './shared/provider-fault.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.setGlobalPrefix('api');
  app.useGlobalFilters(new ProviderFaultFilter());
  app.enableShutdownHooks();

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder().setTitle('Rail ribbon').setDescription('Train timelines for small 1-bit displays').build(),
  );
  SwaggerModule.setup('api/docs', app, document);

  const config = app.get<AppConfig>(APP_CONFIG);
  await app.listen(config.port);
  Logger.log(`Listening on http://localhost:${config.port}/api/trains?stations=NYP,NWK,PHL`, 'Bootstrap');
}

bootstrap().catch((err) => {
  Logger.error('Bootstrap failed', err instanceof Error ? err.stack : String(err), 'Bootstrap');
  process.exit(1);
});
