import { z } from "zod";
import { DEFAULT_OPENWEATHER_BASE_URL } from "../config.js";
import type { ResilientFetcher } from "../http/resilient-fetcher.js";
import type { Coordinate } from "../schema.js";
import type { FetchResult, JsonObject, SourceAdapter, SourceAdapterOptions } from "./types.js";
import { unavailableResult } from "./types.js";

export interface WeatherAdapterOptions extends SourceAdapterOptions {
  apiKey?: string;
  fetcher: ResilientFetcher;
  now?: () => Date;
}

export interface WeatherSignals {
  temperatureC?: number;
  humidityPct?: number;
  locationName?: string;
  /**
   * ISO timestamp of the observation reported by the source.
   */
  observedAt?: string;
}

const finite = z.number().finite().optional().catch(undefined);

const CurrentWeatherSchema = z
  .object({
    main: z
      .object({ temp: finite, humidity: finite })
      .optional()
      .catch(undefined),
    name: z.string().min(1).optional().catch(undefined),
    dt: z.number().int().positive().optional().catch(undefined)
  })
  .catch({});

export const readWeatherSignals = (payload: JsonObject): WeatherSignals => {
  const current = CurrentWeatherSchema.parse(payload);
  return {
    temperatureC: current.main?.temp,
    humidityPct: current.main?.humidity,
    locationName: current.name,
    observedAt: current.dt ? new Date(current.dt * 1000).toISOString() : undefined
  };
};

export class WeatherAdapter implements SourceAdapter<WeatherSignals> {
  readonly id = "openweathermap";
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs?: number;
  private readonly fetcher: ResilientFetcher;
  private readonly now: () => Date;

  constructor(options: WeatherAdapterOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_OPENWEATHER_BASE_URL;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetcher = options.fetcher;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(coordinate: Coordinate): Promise<FetchResult> {
    const endpoint = `${this.baseUrl.replace(/\/$/, "")}/weather`;
    if (!this.apiKey) {
      return unavailableResult(endpoint, "OpenWeatherMap API key is not configured", this.now().toISOString());
    }

    return this.fetcher.fetch({
      endpoint,
      query: {
        lat: coordinate.latitude,
        lon: coordinate.longitude,
        units: "metric",
        appid: this.apiKey
      },
      timeoutMs: this.timeoutMs,
      sensitiveParams: ["appid"]
    });
  }

  parse(payload: JsonObject): WeatherSignals {
    return readWeatherSignals(payload);
  }
}

export const createWeatherAdapter = (options: WeatherAdapterOptions): WeatherAdapter =>
  new WeatherAdapter(options);
