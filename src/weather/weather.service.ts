import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigType } from '@nestjs/config';
import { AxiosError, isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import { appConfig } from '../config/configuration';
import {
  ToolInvocationErrorKind,
  WeatherInfo,
  WeatherLookupResult,
} from './interfaces/weather.interface';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function optionalNumber(value: unknown): number | undefined {
  return isNumber(value) ? value : undefined;
}

@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);

  constructor(
    private readonly httpService: HttpService,
    @Inject(appConfig.KEY)
    private readonly config: ConfigType<typeof appConfig>,
  ) {}

  /**
   * Current conditions for a city from OpenWeatherMap.
   *
   * One GET, no retry. Every failure comes back as a tagged error value;
   * the returned promise does not reject.
   */
  async lookup(city: string): Promise<WeatherLookupResult> {
    const query = city.trim();
    if (!query) {
      return this.failure('InvalidResponse', city, 'City name is empty');
    }

    try {
      this.logger.log(`Looking up current weather for "${query}"`);
      const response = await firstValueFrom(
        this.httpService.get<unknown>(this.config.weatherApiUrl, {
          params: {
            q: query,
            appid: this.config.weatherApiKey,
            units: this.config.weatherUnits,
          },
          timeout: this.config.weatherTimeoutMs,
        }),
      );

      // axios rejects anything outside 2xx, so this only sees 201..299.
      if (response.status !== 200) {
        return this.failure(
          'InvalidResponse',
          query,
          `Unexpected status ${response.status} from weather provider`,
          response.status,
        );
      }
      return this.mapPayload(query, response.data);
    } catch (error) {
      return this.mapRequestError(query, error);
    }
  }

  private mapPayload(query: string, payload: unknown): WeatherLookupResult {
    if (isObject(payload) && String(payload.cod) === '404') {
      return this.failure('NotFound', query, `City not found: ${query}`, 404);
    }

    const data = this.parseCurrentWeather(payload);
    if (!data) {
      const message = `Unrecognised weather payload for ${query}`;
      this.logger.warn(message);
      return this.failure('InvalidResponse', query, message);
    }
    return { success: true, data };
  }

  private parseCurrentWeather(payload: unknown): WeatherInfo | null {
    if (!isObject(payload)) return null;
    if (payload.cod !== undefined && String(payload.cod) !== '200') return null;

    const { name, main, weather, wind, visibility, rain } = payload;
    if (typeof name !== 'string' || name.trim() === '') return null;
    if (!isObject(main) || !isObject(wind) || !Array.isArray(weather)) {
      return null;
    }

    const condition: unknown = weather[0];
    if (!isObject(condition)) return null;
    const { description } = condition;
    if (typeof description !== 'string') return null;

    const { temp, feels_like, humidity, pressure } = main;
    const windSpeed = wind.speed;
    if (
      !isNumber(temp) ||
      !isNumber(feels_like) ||
      !isNumber(humidity) ||
      !isNumber(pressure) ||
      !isNumber(windSpeed)
    ) {
      return null;
    }
    if (humidity < 0 || humidity > 100) return null;

    return {
      city: name,
      temperature: temp,
      feelsLike: feels_like,
      conditionDescription: description,
      humidity,
      pressure,
      windSpeed,
      visibility: optionalNumber(visibility),
      rain1h: isObject(rain) ? optionalNumber(rain['1h']) : undefined,
    };
  }

  private mapRequestError(query: string, error: unknown): WeatherLookupResult {
    if (!isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Weather lookup for ${query} failed: ${message}`);
      return this.failure('NetworkError', query, message);
    }

    const status = error.response?.status;
    if (status === 404) {
      return this.failure('NotFound', query, `City not found: ${query}`, status);
    }
    if (status !== undefined) {
      this.logger.warn(
        `Weather provider answered ${status} for ${query}: ${error.message}`,
      );
      return this.failure('ProviderUnavailable', query, error.message, status);
    }
    if (
      error.code === AxiosError.ECONNABORTED ||
      error.code === AxiosError.ETIMEDOUT
    ) {
      this.logger.warn(`Weather provider timed out for ${query}`);
      return this.failure('ProviderUnavailable', query, error.message);
    }

    this.logger.error(
      `Could not reach weather provider for ${query}: ${error.message}`,
    );
    return this.failure('NetworkError', query, error.message);
  }

  private failure(
    kind: ToolInvocationErrorKind,
    city: string,
    message: string,
    statusCode?: number,
  ): WeatherLookupResult {
    return { success: false, error: { kind, city, statusCode, message } };
  }
}
