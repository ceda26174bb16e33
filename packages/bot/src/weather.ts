/**
 * Weather lookup against Open-Meteo (geocoding, then current conditions).
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { createLogger } from '@relaybot/types';
import type { Logger, WeatherUnits } from '@relaybot/types';
import { NetworkError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';
const DEFAULT_TIMEOUT_MS = 10000;

const WEATHER_CODES = z
  .record(z.string())
  .parse(JSON.parse(readFileSync(new URL('./data/wmo-codes.json', import.meta.url), 'utf-8')));

// ═══════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

const GeocodingResponseSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string().optional(),
        country: z.string().optional(),
        latitude: z.number(),
        longitude: z.number(),
      }),
    )
    .optional(),
});

const ForecastResponseSchema = z.object({
  current: z
    .object({
      temperature_2m: z.number().optional(),
      apparent_temperature: z.number().optional(),
      wind_speed_10m: z.number().optional(),
      weather_code: z.number().optional(),
    })
    .optional(),
});

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════

export interface WeatherService {
  /** One-line report for a place. Throws NetworkError on service failure. */
  describe(place: string): Promise<string>;
}

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface OpenMeteoConfig {
  units: WeatherUnits;
  lang: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export function describeWeatherCode(code: number | undefined): string {
  if (code === undefined) {
    return 'unknown';
  }
  return WEATHER_CODES[String(Math.trunc(code))] ?? `code ${code}`;
}

export class OpenMeteoWeatherClient implements WeatherService {
  private readonly units: WeatherUnits;
  private readonly lang: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;

  constructor(config: OpenMeteoConfig) {
    this.units = config.units;
    this.lang = config.lang;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.log = config.logger ?? createLogger('Weather');
  }

  async describe(place: string): Promise<string> {
    const geo = await this.getJson(
      `${GEOCODING_URL}?${new URLSearchParams({
        name: place,
        count: '1',
        language: this.lang,
        format: 'json',
      })}`,
      GeocodingResponseSchema,
    );

    const location = geo.results?.[0];
    if (!location) {
      return `❌ Location not found: ${place}`;
    }

    const imperial = this.units === 'imperial';
    const forecast = await this.getJson(
      `${FORECAST_URL}?${new URLSearchParams({
        latitude: String(location.latitude),
        longitude: String(location.longitude),
        current: 'temperature_2m,apparent_temperature,wind_speed_10m,weather_code',
        temperature_unit: imperial ? 'fahrenheit' : 'celsius',
        wind_speed_unit: imperial ? 'mph' : 'kmh',
      })}`,
      ForecastResponseSchema,
    );

    const current = forecast.current ?? {};
    const tUnit = imperial ? '°F' : '°C';
    const wUnit = imperial ? 'mph' : 'km/h';
    const name = location.name ?? place;
    const where = location.country ? `${name}, ${location.country}` : name;
    const value = (v: number | undefined) => (v === undefined ? '?' : String(v));

    return (
      `🌦️ ${where}: ${value(current.temperature_2m)}${tUnit} ` +
      `(feels like ${value(current.apparent_temperature)}${tUnit}), ` +
      `${describeWeatherCode(current.weather_code)}, wind ${value(current.wind_speed_10m)} ${wUnit}`
    );
  }

  // ─────────────────────────────────────────────────────────────────────────
  // PRIVATE
  // ─────────────────────────────────────────────────────────────────────────

  private async getJson<T>(url: string, schema: z.ZodType<T>): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (e) {
      const name = e instanceof Error ? e.name : '';
      if (name === 'TimeoutError' || name === 'AbortError') {
        throw new NetworkError('timeout', `Request timed out after ${this.timeoutMs}ms`);
      }
      this.log.warn(`Request failed: ${e instanceof Error ? e.message : String(e)}`);
      throw new NetworkError('unreachable');
    }

    if (!response.ok) {
      throw new NetworkError('status', `HTTP ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new NetworkError('invalid-response', 'Response body is not JSON');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new NetworkError('invalid-response', parsed.error.message);
    }
    return parsed.data;
  }
}
