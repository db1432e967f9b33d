import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  ChatSession,
  FunctionCall,
  GenerateContentResult,
  GoogleGenerativeAI,
  HarmBlockThreshold,
  HarmCategory,
  ModelParams,
  Part,
} from '@google/generative-ai';
import { appConfig } from '../config/configuration';
import { WeatherToolService } from '../weather/weather-tool.service';

const MAX_TOOL_ROUNDS = 5;

export const WEATHER_ASSISTANT_INSTRUCTIONS = `You are a weather assistant that provides current weather information.

When asked about the weather, or whenever the user mentions a city, use the get_weather tool to fetch accurate data instead of guessing.
If the user doesn't specify a country and the city name is ambiguous, ask for clarification (e.g. Paris, France vs. Paris, Texas).
If the tool says it could not get the weather, tell the user plainly and suggest checking the city name.

In addition to the weather details, add friendly commentary, including clothing suggestions or activity recommendations based on the conditions.
Only answer questions about the weather.`;

/** The part of a chat the agent loop talks to. */
export type AssistantChat = Pick<ChatSession, 'sendMessage'>;

@Injectable()
export class GeminiService {
  private readonly genAI: GoogleGenerativeAI;
  private readonly logger = new Logger(GeminiService.name);

  constructor(
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
    private readonly weatherTool: WeatherToolService,
  ) {
    this.genAI = new GoogleGenerativeAI(config.modelApiKey);
  }

  buildModelParams(): ModelParams {
    return {
      model: this.config.modelName,
      systemInstruction: WEATHER_ASSISTANT_INSTRUCTIONS,
      tools: [{ functionDeclarations: [this.weatherTool.declaration] }],
      safetySettings: [
        {
          category: HarmCategory.HARM_CATEGORY_HARASSMENT,
          threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH,
        },
      ],
    };
  }

  createChatSession(): ChatSession {
    const model = this.genAI.getGenerativeModel(this.buildModelParams());
    return model.startChat({
      history: [],
      generationConfig: { maxOutputTokens: 1000 },
    });
  }

  /**
   * Sends one user turn and resolves with the model's final text.
   *
   * The model may ask for the weather tool any number of times before it
   * answers; each request is run in order and its result sent back.
   */
  async reply(chat: AssistantChat, userText: string): Promise<string> {
    let result = await chat.sendMessage(userText);

    for (let round = 0; round < MAX_TOOL_ROUNDS; round++) {
      const calls = result.response.functionCalls();
      if (!calls || calls.length === 0) {
        return this.finalText(result);
      }

      const responses: Part[] = [];
      for (const call of calls) {
        responses.push(await this.runTool(call));
      }
      result = await chat.sendMessage(responses);
    }

    if (result.response.functionCalls()?.length) {
      this.logger.warn(`Model kept calling tools after ${MAX_TOOL_ROUNDS} rounds`);
      return 'I could not finish looking that up. Please try asking again.';
    }
    return this.finalText(result);
  }

  private async runTool(call: FunctionCall): Promise<Part> {
    this.logger.log(`Tool call: ${call.name}(${JSON.stringify(call.args)})`);
    const output =
      call.name === this.weatherTool.declaration.name
        ? await this.weatherTool.invoke(call.args)
        : `Unknown tool: ${call.name}`;
    return { functionResponse: { name: call.name, response: { result: output } } };
  }

  private finalText(result: GenerateContentResult): string {
    return result.response.text().trim();
  }
}
