import 'reflect-metadata';
import { INestApplicationContext, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { configModuleOptions } from '../src/config/configuration';
import { GeminiModule } from '../src/gemini/gemini.module';
import { GeminiService } from '../src/gemini/gemini.service';

@Module({
  imports: [ConfigModule.forRoot(configModuleOptions), GeminiModule],
})
class AskWeatherModule {}

/**
 * Asks the weather assistant one question from the command line, without
 * starting the Telegram bot:
 *
 *   npm run ask -- "Find the weather in Islamabad"
 */
async function run() {
  const question = process.argv.slice(2).join(' ').trim();
  if (!question) {
    console.error('Usage: npm run ask -- "<question about the weather>"');
    process.exitCode = 1;
    return;
  }

  let app: INestApplicationContext | null = null;
  try {
    app = await NestFactory.createApplicationContext(AskWeatherModule, {
      logger: ['error', 'warn'],
    });
    const gemini = app.get(GeminiService);
    const answer = await gemini.reply(gemini.createChatSession(), question);
    console.log(answer);
  } catch (error) {
    console.error('❌ Could not get an answer:', error);
    process.exitCode = 1;
  } finally {
    await app?.close();
  }
}

run().catch((error: unknown) => {
  console.error('❌ Could not shut down cleanly:', error);
  process.exitCode = 1;
});
