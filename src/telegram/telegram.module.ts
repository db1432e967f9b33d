import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { WeatherModule } from '../weather/weather.module';
import { ConversationService } from './conversation.service';
import { TelegramController } from './telegram.controller';
import { TelegramService } from './telegram.service';

@Module({
  imports: [GeminiModule, WeatherModule],
  controllers: [TelegramController],
  providers: [TelegramService, ConversationService],
  exports: [TelegramService],
})
export class TelegramModule {}
