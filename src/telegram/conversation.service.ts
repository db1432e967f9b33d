import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pTimeout from 'p-timeout';
import { appConfig } from '../config/configuration';
import { GeminiService } from '../gemini/gemini.service';
import { MySession } from './telegram.interfaces';

export const EMPTY_ANSWER_MESSAGE = "Sorry, I don't have an answer for that.";

@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);

  constructor(
    private readonly geminiService: GeminiService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  /**
   * Answers one message within the chat's ongoing conversation. Always
   * resolves with text to show the user; a failed turn drops the model
   * conversation so the next message starts fresh.
   */
  async respond(session: MySession, userText: string): Promise<string> {
    if (!session.assistantChat) {
      this.logger.log('Starting a new Gemini chat session');
      session.assistantChat = this.geminiService.createChatSession();
    }

    try {
      const answer = await pTimeout(
        this.geminiService.reply(session.assistantChat, userText),
        this.config.replyTimeoutMs,
      );
      return answer || EMPTY_ANSWER_MESSAGE;
    } catch (error) {
      this.logger.error(
        'Gemini could not answer the message',
        error instanceof Error ? error.stack : String(error),
      );
      session.assistantChat = undefined;
      return this.describeFailure(error);
    }
  }

  reset(session: MySession): void {
    session.assistantChat = undefined;
  }

  private describeFailure(error: unknown): string {
    const name = error instanceof Error ? error.name : '';
    const message = error instanceof Error ? error.message : String(error);

    if (name === 'TimeoutError') {
      return 'This is taking longer than expected. Please try again in a minute.';
    }
    if (message.includes('SAFETY')) {
      return "Sorry, I can't help with that request.";
    }
    if (message.includes('429') || /quota/i.test(message)) {
      return "I'm a bit overloaded right now. Please try again in a few seconds.";
    }
    return "Sorry, I'm having trouble reaching my language model right now. Please try again, or use /weather <city>.";
  }
}
