export interface WeatherQuery {
  city: string;
}

export interface WeatherInfo {
  readonly city: string;
  readonly temperature: number;
  readonly feelsLike: number;
  readonly conditionDescription: string;
  /** Relative humidity, 0 to 100. */
  readonly humidity: number;
  /** Sea level pressure in hPa. */
  readonly pressure: number;
  readonly windSpeed: number;
  /** Metres, when the provider reports it. */
  readonly visibility?: number;
  /** Rain volume over the last hour in mm, when it rained. */
  readonly rain1h?: number;
}

export type ToolInvocationErrorKind =
  | 'NotFound'
  | 'ProviderUnavailable'
  | 'InvalidResponse'
  | 'NetworkError';

export interface ToolInvocationError {
  kind: ToolInvocationErrorKind;
  city: string;
  statusCode?: number;
  message: string;
}

export type WeatherLookupResult =
  | { success: true; data: WeatherInfo }
  | { success: false; error: ToolInvocationError };
