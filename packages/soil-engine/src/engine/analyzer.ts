import type { AtmosphericSignals } from "../adapters/atmospheric.js";
import { createAtmosphericAdapter } from "../adapters/atmospheric.js";
import type { SoilPropertySignals } from "../adapters/soil-property.js";
import { createSoilPropertyAdapter } from "../adapters/soil-property.js";
import type { FetchResult, SourceAdapter } from "../adapters/types.js";
import { unavailableResult } from "../adapters/types.js";
import type { WeatherSignals } from "../adapters/weather.js";
import { createWeatherAdapter } from "../adapters/weather.js";
import type { SoilscopeConfig } from "../config.js";
import { describeError } from "../errors.js";
import { createResilientFetcher } from "../http/resilient-fetcher.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { AnalysisResult, AnalysisResultCore, Coordinate } from "../schema.js";
import { parseCoordinate } from "../validation/coordinate.js";
import { SoilProfileBuilder, emptyProfileCore } from "./profile-builder.js";

export interface AnalyzerAdapters {
  weather: SourceAdapter<WeatherSignals>;
  atmospheric: SourceAdapter<AtmosphericSignals>;
  soil: SourceAdapter<SoilPropertySignals>;
}

export interface SoilAnalyzerOptions {
  adapters: AnalyzerAdapters;
  builder?: SoilProfileBuilder;
  logger?: Logger;
  now?: () => Date;
}

export interface AnalyzeOptions {
  /**
   * Aborting stops the wait for source responses. In-flight requests keep
   * running until their own timeouts and their results are discarded.
   */
  signal?: AbortSignal;
}

const abandonOnAbort = <T>(work: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) {
    return Promise.reject(new Error("Analysis aborted by caller"));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("Analysis aborted by caller"));
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
};

/**
 * Freezes `value` and every object or array reachable from it.
 */
const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export class SoilAnalyzer {
  private readonly adapters: AnalyzerAdapters;
  private readonly builder: SoilProfileBuilder;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SoilAnalyzerOptions) {
    const { adapters } = options;
    this.adapters = adapters;
    this.builder =
      options.builder ??
      new SoilProfileBuilder({
        weather: (payload) => adapters.weather.parse(payload),
        atmospheric: (payload) => adapters.atmospheric.parse(payload),
        soil: (payload) => adapters.soil.parse(payload)
      });
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Builds the profile for one point. Always resolves; bad input, caller aborts
   * and internal faults come back as Insufficient results with `error` set.
   */
  async analyze(latitude: number, longitude: number, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    let coordinate: Coordinate;
    try {
      coordinate = parseCoordinate(latitude, longitude);
    } catch (error) {
      this.logger.warn({ latitude, longitude, err: describeError(error) }, "Rejected coordinate");
      return this.errorResult({ latitude, longitude }, describeError(error));
    }

    try {
      const gathered = this.gather(coordinate);
      const [weather, atmospheric, soil] = options.signal
        ? await abandonOnAbort(gathered, options.signal)
        : await gathered;
      const core = this.builder.build(weather, atmospheric, soil);
      this.logger.info(
        {
          latitude: coordinate.latitude,
          longitude: coordinate.longitude,
          quality: core.quality,
          sources: core.sources.filter((source) => source.ok).map((source) => source.id)
        },
        "Soil analysis complete"
      );
      return this.finalize(coordinate, core);
    } catch (error) {
      this.logger.error(
        { latitude: coordinate.latitude, longitude: coordinate.longitude, err: describeError(error) },
        "Soil analysis failed"
      );
      return this.errorResult(coordinate, describeError(error));
    }
  }

  /**
   * Runs all three adapters concurrently. A rejecting adapter is reported as
   * unavailable rather than failing the others.
   */
  private async gather(coordinate: Coordinate): Promise<[FetchResult, FetchResult, FetchResult]> {
    const { weather, atmospheric, soil } = this.adapters;
    const [weatherResult, atmosphericResult, soilResult] = await Promise.allSettled([
      weather.fetch(coordinate),
      atmospheric.fetch(coordinate),
      soil.fetch(coordinate)
    ]);
    return [
      this.settle(weather.id, weatherResult),
      this.settle(atmospheric.id, atmosphericResult),
      this.settle(soil.id, soilResult)
    ];
  }

  private settle(id: string, outcome: PromiseSettledResult<FetchResult>): FetchResult {
    if (outcome.status === "fulfilled") {
      return outcome.value;
    }
    const message = describeError(outcome.reason);
    this.logger.error({ source: id, err: message }, "Source adapter threw");
    return unavailableResult("", message, this.now().toISOString());
  }

  private finalize(coordinate: Coordinate, core: AnalysisResultCore, error?: string): AnalysisResult {
    const result: AnalysisResult = {
      ...core,
      coordinate: { latitude: coordinate.latitude, longitude: coordinate.longitude },
      timestamp: this.now().toISOString(),
      ...(error ? { error } : {})
    };
    return deepFreeze(result);
  }

  private errorResult(coordinate: Coordinate, error: string): AnalysisResult {
    return this.finalize(coordinate, emptyProfileCore(), error);
  }
}

export interface SoilAnalyzerDependencies {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Wires the default adapters against the configured sources.
 */
export const createSoilAnalyzer = (
  config: SoilscopeConfig,
  dependencies: SoilAnalyzerDependencies = {}
): SoilAnalyzer => {
  const fetcher = createResilientFetcher({
    maxRetries: config.retry.maxRetries,
    baseDelayMs: config.retry.baseDelayMs,
    userAgent: config.userAgent,
    fetchImpl: dependencies.fetchImpl,
    sleep: dependencies.sleep,
    logger: dependencies.logger,
    now: dependencies.now
  });

  return new SoilAnalyzer({
    adapters: {
      weather: createWeatherAdapter({ ...config.weather, fetcher, now: dependencies.now }),
      atmospheric: createAtmosphericAdapter({ ...config.atmospheric, fetcher, now: dependencies.now }),
      soil: createSoilPropertyAdapter({ ...config.soil, fetcher })
    },
    logger: dependencies.logger,
    now: dependencies.now
  });
};
