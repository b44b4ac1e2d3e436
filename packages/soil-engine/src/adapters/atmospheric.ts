import { z } from "zod";
import { DEFAULT_NASA_POWER_BASE_URL } from "../config.js";
import type { ResilientFetcher } from "../http/resilient-fetcher.js";
import type { Coordinate } from "../schema.js";
import type { FetchResult, JsonObject, SourceAdapter, SourceAdapterOptions } from "./types.js";

export const POWER_PARAMETERS = {
  temperature: "T2M",
  humidity: "RH2M",
  precipitation: "PRECTOTCORR",
  shortwaveRadiation: "ALLSKY_SFC_SW_DWN",
  longwaveRadiation: "ALLSKY_SFC_LW_DWN"
} as const;

/**
 * NASA POWER marks days without data with this sentinel.
 */
export const POWER_FILL_VALUE = -999;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AtmosphericAdapterOptions extends SourceAdapterOptions {
  apiKey?: string;
  fetcher: ResilientFetcher;
  windowDays?: number;
  community?: string;
  now?: () => Date;
}

export interface AtmosphericSignals {
  meanTemperatureC?: number;
  meanHumidityPct?: number;
  meanPrecipitationMm?: number;
  meanShortwaveRadiation?: number;
  meanLongwaveRadiation?: number;
  /**
   * Number of daily entries with a usable temperature value.
   */
  temperatureDays: number;
}

const ParameterTableSchema = z
  .object({
    properties: z
      .object({ parameter: z.record(z.unknown()).catch({}) })
      .catch({ parameter: {} })
  })
  .catch({ properties: { parameter: {} } });

const DailySeriesSchema = z.record(z.unknown()).catch({});

const usableValues = (series: unknown): number[] =>
  Object.values(DailySeriesSchema.parse(series)).filter(
    (value): value is number => typeof value === "number" && Number.isFinite(value) && value !== POWER_FILL_VALUE
  );

const mean = (values: number[]): number | undefined =>
  values.length === 0 ? undefined : values.reduce((sum, value) => sum + value, 0) / values.length;

export const readAtmosphericSignals = (payload: JsonObject): AtmosphericSignals => {
  const { parameter } = ParameterTableSchema.parse(payload).properties;
  const temperatures = usableValues(parameter[POWER_PARAMETERS.temperature]);
  return {
    meanTemperatureC: mean(temperatures),
    meanHumidityPct: mean(usableValues(parameter[POWER_PARAMETERS.humidity])),
    meanPrecipitationMm: mean(usableValues(parameter[POWER_PARAMETERS.precipitation])),
    meanShortwaveRadiation: mean(usableValues(parameter[POWER_PARAMETERS.shortwaveRadiation])),
    meanLongwaveRadiation: mean(usableValues(parameter[POWER_PARAMETERS.longwaveRadiation])),
    temperatureDays: temperatures.length
  };
};

/**
 * Formats a date as the YYYYMMDD string POWER expects, in UTC.
 */
export const formatPowerDate = (date: Date): string => date.toISOString().slice(0, 10).replace(/-/g, "");

export class AtmosphericAdapter implements SourceAdapter<AtmosphericSignals> {
  readonly id = "nasa-power";
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs?: number;
  private readonly windowDays: number;
  private readonly community: string;
  private readonly fetcher: ResilientFetcher;
  private readonly now: () => Date;

  constructor(options: AtmosphericAdapterOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_NASA_POWER_BASE_URL;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.windowDays = options.windowDays ?? 7;
    this.community = options.community ?? "AG";
    this.fetcher = options.fetcher;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(coordinate: Coordinate): Promise<FetchResult> {
    const end = this.now();
    const start = new Date(end.getTime() - this.windowDays * DAY_MS);

    return this.fetcher.fetch({
      endpoint: this.baseUrl,
      query: {
        start: formatPowerDate(start),
        end: formatPowerDate(end),
        latitude: coordinate.latitude,
        longitude: coordinate.longitude,
        community: this.community,
        parameters: Object.values(POWER_PARAMETERS).join(","),
        format: "JSON",
        api_key: this.apiKey
      },
      timeoutMs: this.timeoutMs,
      sensitiveParams: ["api_key"]
    });
  }

  parse(payload: JsonObject): AtmosphericSignals {
    return readAtmosphericSignals(payload);
  }
}

export const createAtmosphericAdapter = (options: AtmosphericAdapterOptions): AtmosphericAdapter =>
  new AtmosphericAdapter(options);
