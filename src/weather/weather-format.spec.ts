import { WeatherInfo } from './interfaces/weather.interface';
import {
  describeLookupFailure,
  formatWeatherReport,
  formatWeatherSentence,
} from './weather-format';

const islamabad: WeatherInfo = {
  city: 'Islamabad',
  temperature: 29.5,
  feelsLike: 28,
  conditionDescription: 'clear sky',
  humidity: 40,
  pressure: 1008,
  windSpeed: 3.1,
  visibility: 10000,
};

describe('formatWeatherSentence', () => {
  it('keeps the provider values as they are', () => {
    expect(formatWeatherSentence(islamabad)).toBe(
      'It is clear sky in Islamabad with a temperature of 29.5 and humidity of 40%.',
    );
  });
});

describe('describeLookupFailure', () => {
  it('uses the trimmed city in the apology', () => {
    expect(
      describeLookupFailure({ kind: 'NotFound', city: ' Zzyxville ', message: 'x' }),
    ).toBe('I could not find weather data for Zzyxville.');
  });

  it('asks for a city when the query was blank', () => {
    expect(
      describeLookupFailure({ kind: 'InvalidResponse', city: '  ', message: 'x' }),
    ).toBe('I need a city name to look up the weather.');
  });
});

describe('formatWeatherReport', () => {
  it('renders a metric report with escaped values', () => {
    expect(formatWeatherReport(islamabad, 'metric')).toBe(
      [
        '🌍 *Weather in Islamabad*',
        '🌡 *Temperature:* 29\\.5°C \\(feels like 28°C\\)',
        '☁️ *Conditions:* clear sky',
        '💧 *Humidity:* 40%',
        '💨 *Wind speed:* 3\\.1 m/s',
        '🧭 *Pressure:* 1008 hPa',
        '👀 *Visibility:* 10000 m',
      ].join('\n'),
    );
  });

  it('uses imperial symbols and adds rain when reported', () => {
    const oslo: WeatherInfo = {
      city: 'Oslo',
      temperature: -3,
      feelsLike: -7.2,
      conditionDescription: 'light snow',
      humidity: 85,
      pressure: 1020,
      windSpeed: 12,
      rain1h: 0.4,
    };

    expect(formatWeatherReport(oslo, 'imperial')).toBe(
      [
        '🌍 *Weather in Oslo*',
        '🌡 *Temperature:* \\-3°F \\(feels like \\-7\\.2°F\\)',
        '☁️ *Conditions:* light snow',
        '💧 *Humidity:* 85%',
        '💨 *Wind speed:* 12 mph',
        '🧭 *Pressure:* 1020 hPa',
        '🌧 *Rain \\(last hour\\):* 0\\.4 mm',
      ].join('\n'),
    );
  });

  it('reports kelvin for standard units', () => {
    const report = formatWeatherReport({ ...islamabad, temperature: 302, feelsLike: 301 }, 'standard');

    expect(report.split('\n')[1]).toBe('🌡 *Temperature:* 302K \\(feels like 301K\\)');
  });
});
