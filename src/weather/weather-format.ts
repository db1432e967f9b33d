import { WeatherUnits } from '../config/configuration';
import { escapeMarkdownV2 } from '../utils/telegram-format';
import { ToolInvocationError, WeatherInfo } from './interfaces/weather.interface';

const UNIT_SYMBOLS: Record<WeatherUnits, { temperature: string; speed: string }> = {
  metric: { temperature: '°C', speed: 'm/s' },
  imperial: { temperature: '°F', speed: 'mph' },
  standard: { temperature: 'K', speed: 'm/s' },
};

/** The one-line answer the agent receives from the weather tool. */
export function formatWeatherSentence(info: WeatherInfo): string {
  return `It is ${info.conditionDescription} in ${info.city} with a temperature of ${info.temperature} and humidity of ${info.humidity}%.`;
}

export function describeLookupFailure(error: ToolInvocationError): string {
  const city = error.city.trim();
  switch (error.kind) {
    case 'NotFound':
      return `I could not find weather data for ${city}.`;
    case 'ProviderUnavailable':
      return `The weather service is not available right now, so I could not get the weather for ${city}.`;
    case 'NetworkError':
      return `I could not reach the weather service to look up ${city}.`;
    case 'InvalidResponse':
      return city
        ? `I could not read the weather data returned for ${city}.`
        : 'I need a city name to look up the weather.';
  }
}

/**
 * Full conditions card for the /weather command, ready for MarkdownV2.
 * Labels stay bold; every value is escaped.
 */
export function formatWeatherReport(info: WeatherInfo, units: WeatherUnits): string {
  const symbols = UNIT_SYMBOLS[units];
  const value = (text: string | number) => escapeMarkdownV2(String(text));

  const lines = [
    `🌍 *Weather in ${value(info.city)}*`,
    `🌡 *Temperature:* ${value(`${info.temperature}${symbols.temperature} (feels like ${info.feelsLike}${symbols.temperature})`)}`,
    `☁️ *Conditions:* ${value(info.conditionDescription)}`,
    `💧 *Humidity:* ${value(`${info.humidity}%`)}`,
    `💨 *Wind speed:* ${value(`${info.windSpeed} ${symbols.speed}`)}`,
    `🧭 *Pressure:* ${value(`${info.pressure} hPa`)}`,
  ];
  if (info.visibility !== undefined) {
    lines.push(`👀 *Visibility:* ${value(`${info.visibility} m`)}`);
  }
  if (info.rain1h !== undefined) {
    lines.push(`🌧 *Rain \\(last hour\\):* ${value(`${info.rain1h} mm`)}`);
  }
  return lines.join('\n');
}
