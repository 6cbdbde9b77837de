// ============================================================================
// Current Weather
// ============================================================================
// Current conditions from the Open-Meteo forecast API.
// ============================================================================

import { z } from 'zod';
import { getJson } from '../lib/http.js';
import { ToolFault, describeError } from '../errors.js';
import { log } from '../config.js';

export interface ObserveInput {
  latitude: number;
  longitude: number;
}

export interface WeatherObservation {
  temperature: number | null;
  windspeed: number | null;
  winddirection: number | null;
  weathercode: number | null;
  time: string | null;
}

export interface WeatherDeps {
  apiUrl: string;
  timeoutMs: number;
  userAgent: string;
  signal?: AbortSignal;
}

export const NO_WEATHER_MESSAGE = 'No weather data available.';

const ForecastResponseSchema = z.object({
  current_weather: z.record(z.unknown()),
});

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export async function observe(
  input: ObserveInput,
  deps: WeatherDeps
): Promise<WeatherObservation | ToolFault> {
  let raw: unknown;
  try {
    raw = await getJson(
      deps.apiUrl,
      {
        latitude: input.latitude,
        longitude: input.longitude,
        current_weather: true,
      },
      {
        timeoutMs: deps.timeoutMs,
        signal: deps.signal,
        headers: { 'User-Agent': deps.userAgent },
      }
    );
  } catch (err) {
    const cause = describeError(err);
    log(`Weather: request (${input.latitude}, ${input.longitude}) failed: ${cause}`);
    return new ToolFault('UpstreamUnavailable', `Failed to fetch weather: ${cause}`, { cause });
  }

  const body = ForecastResponseSchema.safeParse(raw);
  if (!body.success) {
    return new ToolFault('UpstreamDataMissing', NO_WEATHER_MESSAGE);
  }

  const current = body.data.current_weather;
  const weathercode = numberOrNull(current.weathercode);

  return {
    temperature: numberOrNull(current.temperature),
    windspeed: numberOrNull(current.windspeed),
    winddirection: numberOrNull(current.winddirection),
    weathercode: weathercode !== null && Number.isInteger(weathercode) ? weathercode : null,
    time: typeof current.time === 'string' ? current.time : null,
  };
}
