import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Telegraf, session } from 'telegraf';
import type { Message } from 'telegraf/types';
import { appConfig } from '../config/configuration';
import { WeatherService } from '../weather/weather.service';
import { describeLookupFailure, formatWeatherReport } from '../weather/weather-format';
import {
  escapeMarkdownV2,
  parseCommandArgument,
  splitMessage,
} from '../utils/telegram-format';
import { ConversationService } from './conversation.service';
import { MyContext, MySession } from './telegram.interfaces';

export const WELCOME_MESSAGE =
  'Welcome! Check the latest weather updates for your location.';

export const THINKING_MESSAGE = 'Thinking...';

@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly bot: Telegraf<MyContext>;
  private readonly logger = new Logger(TelegramService.name);
  private polling = false;

  constructor(
    private readonly conversationService: ConversationService,
    private readonly weatherService: WeatherService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {
    if (!config.telegramBotToken) {
      throw new Error('BOT_TOKEN is not defined in environment variables');
    }

    this.bot = new Telegraf<MyContext>(config.telegramBotToken);
    this.bot.use(session());
  }

  onModuleInit() {
    this.setupCommands();
    this.logger.log('Telegram bot initialised and commands registered.');
  }

  onModuleDestroy() {
    if (this.polling) {
      this.bot.stop('shutdown');
      this.polling = false;
    }
  }

  getBot(): Telegraf<MyContext> {
    return this.bot;
  }

  async registerWebhook(baseUrl: string): Promise<string> {
    const webhookUrl = `${baseUrl.replace(/\/+$/, '')}/telegram`;
    await this.bot.telegram.setWebhook(webhookUrl);
    return webhookUrl;
  }

  launchPolling(): void {
    this.polling = true;
    this.bot
      .launch(() => this.logger.log('Telegram bot started with long polling.'))
      .catch((error: unknown) => {
        this.polling = false;
        this.logger.error(
          'Telegram long polling stopped',
          error instanceof Error ? error.stack : String(error),
        );
      });
  }

  private getUserName(ctx: MyContext): string {
    return ctx.from?.first_name || 'there';
  }

  private ensureSession(ctx: MyContext): MySession {
    if (!ctx.session) {
      ctx.session = {};
    }
    return ctx.session;
  }

  private setupCommands() {
    this.bot.start(async (ctx) => {
      ctx.session = {};
      await ctx.reply(WELCOME_MESSAGE);
      await this.sendIntroduction(ctx);
    });

    this.bot.help((ctx) => this.sendIntroduction(ctx));

    this.bot.command('weather', async (ctx) => {
      await this.handleWeatherCommand(ctx, parseCommandArgument(ctx.message.text));
    });

    this.bot.command('reset', async (ctx) => {
      this.conversationService.reset(this.ensureSession(ctx));
      await ctx.reply(
        `Done, ${this.getUserName(ctx)}. Let's start a new conversation. Which city are you interested in?`,
      );
    });

    this.bot.hears(/^(help|what can you do\??|who are you\??)$/i, (ctx) =>
      this.sendIntroduction(ctx),
    );

    this.bot.on('text', async (ctx) => {
      const userText = ctx.message.text.trim();
      if (userText.startsWith('/')) return;

      this.logger.log(
        `[Message] From: ${this.getUserName(ctx)} (${ctx.from?.id}) | "${userText}"`,
      );

      const pending = await ctx.reply(THINKING_MESSAGE);
      const answer = await this.conversationService.respond(
        this.ensureSession(ctx),
        userText,
      );
      await this.deliverAnswer(ctx, pending, answer);
    });

    this.bot.catch((error, ctx) => {
      this.logger.error(
        `Unhandled error for update ${ctx.update.update_id}`,
        error instanceof Error ? error.stack : String(error),
      );
    });
  }

  /**
   * Replaces the placeholder with the answer. Long answers continue in
   * follow-up messages; if the edit fails the answer is sent as new messages.
   */
  private async deliverAnswer(
    ctx: MyContext,
    pending: Message.TextMessage,
    answer: string,
  ) {
    const [first, ...rest] = splitMessage(answer);
    try {
      await ctx.telegram.editMessageText(
        pending.chat.id,
        pending.message_id,
        undefined,
        first,
      );
    } catch (error) {
      this.logger.warn(
        `Could not edit message ${pending.message_id}, sending the answer instead: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      rest.unshift(first);
    }

    for (const chunk of rest) {
      await ctx.reply(chunk);
    }
  }

  private async handleWeatherCommand(ctx: MyContext, city: string) {
    if (!city) {
      await ctx.reply(
        'Send a city with the command, for example: /weather Islamabad',
      );
      return;
    }

    const result = await this.weatherService.lookup(city);
    if (!result.success) {
      await ctx.reply(describeLookupFailure(result.error));
      return;
    }

    await ctx.reply(formatWeatherReport(result.data, this.config.weatherUnits), {
      parse_mode: 'MarkdownV2',
    });
  }

  private async sendIntroduction(ctx: MyContext) {
    const userName = this.getUserName(ctx);

    const message =
      `*${escapeMarkdownV2(`Hi ${userName}!`)}*\n\n` +
      escapeMarkdownV2(
        "I'm your weather assistant. Ask me about the weather anywhere in plain words, " +
          'for example "Find the weather in Islamabad" or "Do I need an umbrella in London today?"',
      ) +
      '\n\n' +
      `☁️ */weather* ${escapeMarkdownV2('<city>: current conditions without the chat')}\n` +
      `🔄 */reset* ${escapeMarkdownV2(': start a new conversation')}\n` +
      `❓ */help* ${escapeMarkdownV2(': show this message')}`;

    await ctx.reply(message, { parse_mode: 'MarkdownV2' });
  }
}
