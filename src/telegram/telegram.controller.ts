import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import type { Update } from 'telegraf/types';
import { TelegramService } from './telegram.service';

@Controller('telegram')
export class TelegramController {
  constructor(private readonly telegramService: TelegramService) {}

  @Post()
  @HttpCode(200)
  async handleUpdate(@Body() update: Update): Promise<void> {
    await this.telegramService.getBot().handleUpdate(update);
  }
}
