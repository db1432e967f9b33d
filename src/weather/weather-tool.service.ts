import { Injectable, Logger } from '@nestjs/common';
import { FunctionDeclaration, SchemaType } from '@google/generative-ai';
import { WeatherQuery } from './interfaces/weather.interface';
import { WeatherService } from './weather.service';
import { describeLookupFailure, formatWeatherSentence } from './weather-format';

export const GET_WEATHER_TOOL = 'get_weather';

/**
 * Exposes the weather lookup to the model as the `get_weather` tool.
 *
 * Whatever happens during a lookup, the caller gets a sentence back: this is
 * the only place where lookup failures are turned into text.
 */
@Injectable()
export class WeatherToolService {
  private readonly logger = new Logger(WeatherToolService.name);

  readonly declaration: FunctionDeclaration = {
    name: GET_WEATHER_TOOL,
    description: 'Get current weather for a given city',
    parameters: {
      type: SchemaType.OBJECT,
      properties: {
        city: {
          type: SchemaType.STRING,
          description: 'Name of the city, optionally followed by a country, e.g. "Paris, FR"',
        },
      },
      required: ['city'],
    },
  };

  constructor(private readonly weatherService: WeatherService) {}

  /** Runs the tool with the arguments the model supplied. */
  async invoke(args: object): Promise<string> {
    return this.getWeather(this.toQuery(args));
  }

  async getWeather({ city }: WeatherQuery): Promise<string> {
    try {
      const result = await this.weatherService.lookup(city);
      if (result.success) {
        return formatWeatherSentence(result.data);
      }
      this.logger.warn(
        `${GET_WEATHER_TOOL} failed for "${result.error.city}" (${result.error.kind}): ${result.error.message}`,
      );
      return describeLookupFailure(result.error);
    } catch (error) {
      this.logger.error(
        `Unexpected error in ${GET_WEATHER_TOOL}`,
        error instanceof Error ? error.stack : String(error),
      );
      return 'Sorry, something went wrong while looking up the weather.';
    }
  }

  private toQuery(args: object): WeatherQuery {
    return {
      city: 'city' in args && typeof args.city === 'string' ? args.city : '',
    };
  }
}
