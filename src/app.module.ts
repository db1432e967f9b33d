import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { configModuleOptions } from './config/configuration';
import { GeminiModule } from './gemini/gemini.module';
import { KeepAliveService } from './keep-alive.service';
import { TelegramModule } from './telegram/telegram.module';
import { WeatherModule } from './weather/weather.module';

@Module({
  imports: [
    ConfigModule.forRoot(configModuleOptions),
    ScheduleModule.forRoot(),
    HttpModule,
    WeatherModule,
    GeminiModule,
    TelegramModule,
  ],
  // Needed so /ping answers for the hosting health check and KeepAliveService
  controllers: [AppController],
  providers: [KeepAliveService],
})
export class AppModule {}
