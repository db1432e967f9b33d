import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { appConfig } from './config/configuration';
import { TelegramService } from './telegram/telegram.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  const config = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);
  const telegramService = app.get(TelegramService);

  // onModuleDestroy stops long polling when the process is asked to exit
  app.enableShutdownHooks();

  await app.listen(config.port);

  if (config.webhookBaseUrl) {
    const webhookUrl = await telegramService.registerWebhook(config.webhookBaseUrl);
    logger.log(`Webhook registered at ${webhookUrl}`);
  } else {
    telegramService.launchPolling();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Weather assistant failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
