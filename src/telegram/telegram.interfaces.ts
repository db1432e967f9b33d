import { Context } from 'telegraf';
import { AssistantChat } from '../gemini/gemini.service';

export interface MySession {
  /** Model conversation for this chat; created on the first free-text message. */
  assistantChat?: AssistantChat;
}

export interface MyContext extends Context {
  session?: MySession;
}
