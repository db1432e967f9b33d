import { ConfigModuleOptions, registerAs } from '@nestjs/config';

export type WeatherUnits = 'metric' | 'imperial' | 'standard';

const WEATHER_UNITS: readonly WeatherUnits[] = ['metric', 'imperial', 'standard'];

export interface AppConfig {
  weatherApiKey: string;
  modelApiKey: string;
  telegramBotToken?: string;
  weatherApiUrl: string;
  weatherUnits: WeatherUnits;
  weatherTimeoutMs: number;
  modelName: string;
  replyTimeoutMs: number;
  port: number;
  webhookBaseUrl?: string;
  keepAliveUrl?: string;
}

type Environment = Record<string, unknown>;

function readString(env: Environment, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function isWeatherUnits(value: string): value is WeatherUnits {
  return WEATHER_UNITS.some((unit) => unit === value);
}

/**
 * Builds the typed configuration from raw environment values.
 *
 * Throws one error listing every missing or malformed variable, so the
 * application never starts half configured.
 */
export function loadAppConfig(env: Environment): AppConfig {
  const problems: string[] = [];

  const required = (key: string): string => {
    const value = readString(env, key);
    if (!value) {
      problems.push(`${key} is not defined`);
      return '';
    }
    return value;
  };

  const positiveNumber = (key: string, fallback: number): number => {
    const raw = readString(env, key);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      problems.push(`${key} must be a positive integer, got "${raw}"`);
      return fallback;
    }
    return value;
  };

  const units = readString(env, 'WEATHER_UNITS') ?? 'metric';
  if (!isWeatherUnits(units)) {
    problems.push(
      `WEATHER_UNITS must be one of ${WEATHER_UNITS.join(', ')}, got "${units}"`,
    );
  }

  const config: AppConfig = {
    weatherApiKey: required('WEATHER_API_KEY'),
    modelApiKey: required('GEMINI_API_KEY'),
    telegramBotToken: readString(env, 'BOT_TOKEN'),
    weatherApiUrl:
      readString(env, 'WEATHER_API_URL') ??
      'https://api.openweathermap.org/data/2.5/weather',
    weatherUnits: isWeatherUnits(units) ? units : 'metric',
    weatherTimeoutMs: positiveNumber('WEATHER_TIMEOUT_MS', 10_000),
    modelName: readString(env, 'GEMINI_MODEL') ?? 'gemini-2.0-flash',
    replyTimeoutMs: positiveNumber('REPLY_TIMEOUT_MS', 60_000),
    port: positiveNumber('PORT', 3000),
    webhookBaseUrl: readString(env, 'WEBHOOK_BASE_URL'),
    keepAliveUrl: readString(env, 'KEEP_ALIVE_URL'),
  };

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return config;
}

export function validateEnvironment(env: Environment): Environment {
  loadAppConfig(env);
  return env;
}

export const appConfig = registerAs('app', (): AppConfig => loadAppConfig(process.env));

export const configModuleOptions: ConfigModuleOptions = {
  isGlobal: true,
  load: [appConfig],
  validate: validateEnvironment,
};
