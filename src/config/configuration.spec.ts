import { loadAppConfig, validateEnvironment } from './configuration';

const requiredEnv = {
  WEATHER_API_KEY: 'test-weather-key',
  GEMINI_API_KEY: 'test-model-key',
};

describe('loadAppConfig', () => {
  it('applies defaults for everything optional', () => {
    expect(loadAppConfig(requiredEnv)).toEqual({
      weatherApiKey: 'test-weather-key',
      modelApiKey: 'test-model-key',
      telegramBotToken: undefined,
      weatherApiUrl: 'https://api.openweathermap.org/data/2.5/weather',
      weatherUnits: 'metric',
      weatherTimeoutMs: 10000,
      modelName: 'gemini-2.0-flash',
      replyTimeoutMs: 60000,
      port: 3000,
      webhookBaseUrl: undefined,
      keepAliveUrl: undefined,
    });
  });

  it('reads every variable', () => {
    const config = loadAppConfig({
      ...requiredEnv,
      BOT_TOKEN: 'test-bot-token',
      WEATHER_API_URL: 'https://weather.test/current',
      WEATHER_UNITS: 'imperial',
      WEATHER_TIMEOUT_MS: '2500',
      GEMINI_MODEL: 'gemini-test',
      REPLY_TIMEOUT_MS: '30000',
      PORT: '8080',
      WEBHOOK_BASE_URL: 'https://bot.test',
      KEEP_ALIVE_URL: 'https://bot.test/ping',
    });

    expect(config).toEqual({
      weatherApiKey: 'test-weather-key',
      modelApiKey: 'test-model-key',
      telegramBotToken: 'test-bot-token',
      weatherApiUrl: 'https://weather.test/current',
      weatherUnits: 'imperial',
      weatherTimeoutMs: 2500,
      modelName: 'gemini-test',
      replyTimeoutMs: 30000,
      port: 8080,
      webhookBaseUrl: 'https://bot.test',
      keepAliveUrl: 'https://bot.test/ping',
    });
  });

  it('treats blank values as missing', () => {
    expect(() =>
      loadAppConfig({ WEATHER_API_KEY: '   ', GEMINI_API_KEY: 'test-model-key' }),
    ).toThrow('Invalid configuration: WEATHER_API_KEY is not defined');
  });

  it('lists every missing key in one error', () => {
    expect(() => loadAppConfig({})).toThrow(
      'Invalid configuration: WEATHER_API_KEY is not defined; GEMINI_API_KEY is not defined',
    );
  });

  it('rejects malformed numbers and units', () => {
    expect(() =>
      loadAppConfig({ ...requiredEnv, WEATHER_UNITS: 'kelvin', PORT: 'abc' }),
    ).toThrow(
      'Invalid configuration: WEATHER_UNITS must be one of metric, imperial, standard, got "kelvin"; PORT must be a positive integer, got "abc"',
    );
  });
});

describe('validateEnvironment', () => {
  it('passes a complete environment through unchanged', () => {
    const env = { ...requiredEnv, NODE_ENV: 'production' };

    expect(validateEnvironment(env)).toBe(env);
  });

  it('refuses to start without the weather key', () => {
    expect(() => validateEnvironment({ GEMINI_API_KEY: 'test-model-key' })).toThrow(
      'WEATHER_API_KEY is not defined',
    );
  });
});
