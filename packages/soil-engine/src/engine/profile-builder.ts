import type { AtmosphericSignals } from "../adapters/atmospheric.js";
import { readAtmosphericSignals } from "../adapters/atmospheric.js";
import type { SoilPropertySignals } from "../adapters/soil-property.js";
import { readSoilPropertySignals } from "../adapters/soil-property.js";
import type { FetchResult, JsonObject } from "../adapters/types.js";
import type { WeatherSignals } from "../adapters/weather.js";
import { readWeatherSignals } from "../adapters/weather.js";
import type {
  AnalysisResultCore,
  DerivedEstimates,
  EnvironmentalConditions,
  Reading,
  SoilComposition,
  SoilProfile,
  SourceId,
  SourceReport
} from "../schema.js";
import type { RangeSpec } from "../validation/ranges.js";
import { RANGES } from "../validation/ranges.js";
import { validate, validateComposition } from "../validation/range-validator.js";
import { gradeDataQuality } from "./quality.js";
import { classifySoilTexture } from "./soil-classifier.js";

export const ORGANIC_CARBON_TO_MATTER = 0.058;
export const NITROGEN_PER_ORGANIC_MATTER = 0.05;
export const NEUTRAL_PH = 7.0;

interface Candidate {
  source: SourceId;
  ok: boolean;
  value: number | undefined;
}

/**
 * Typed readers over each source payload. Adapters supply their own `parse`;
 * the module-level readers are the default.
 */
export interface PayloadViews {
  weather(payload: JsonObject): WeatherSignals;
  atmospheric(payload: JsonObject): AtmosphericSignals;
  soil(payload: JsonObject): SoilPropertySignals;
}

export const DEFAULT_PAYLOAD_VIEWS: PayloadViews = {
  weather: readWeatherSignals,
  atmospheric: readAtmosphericSignals,
  soil: readSoilPropertySignals
};

const round2 = (value: number): number => Number(value.toFixed(2));

const missing = (range: RangeSpec, source: Reading["source"] = "none"): Reading => ({
  value: range.low,
  valid: false,
  source
});

/**
 * First candidate from a successful source that reported the field wins;
 * the winner is range-checked but never replaced by a later candidate.
 */
const resolveReading = (candidates: Candidate[], range: RangeSpec): Reading => {
  for (const candidate of candidates) {
    if (candidate.ok && candidate.value !== undefined) {
      return { ...validate(candidate.value, range), source: candidate.source };
    }
  }
  return missing(range);
};

const report = (id: SourceId, result: FetchResult): SourceReport => ({
  id,
  ok: result.ok,
  url: result.context.url || undefined,
  attempts: result.context.attempts,
  fetchedAt: result.context.fetchedAt,
  ...(result.context.error ? { error: result.context.error } : {})
});

/**
 * Estimated volumetric moisture (%) from texture-based field capacity nudged
 * by recent precipitation, humidity and temperature.
 */
export const estimateMoisture = (
  composition: SoilComposition,
  environment: EnvironmentalConditions
): Reading => {
  const { clay, sand } = composition;
  const fieldCapacity = (0.3 * clay + 0.2 * (100 - sand - clay)) / 100;
  const moistureFactor =
    (environment.precipitationMm.value * 0.4 +
      environment.humidityPct.value * 0.4 -
      environment.temperatureC.value * 0.2) /
    100;
  const checked = validate(round2(fieldCapacity * (1 + moistureFactor) * 100), RANGES.moisture);
  const inputsValid =
    composition.valid &&
    environment.temperatureC.valid &&
    environment.humidityPct.valid &&
    environment.precipitationMm.valid;
  return { value: checked.value, valid: checked.valid && inputsValid, source: "derived" };
};

export class SoilProfileBuilder {
  constructor(private readonly views: PayloadViews = DEFAULT_PAYLOAD_VIEWS) {}

  /**
   * Merges the three source results into a validated profile. Pure: the same
   * inputs always produce an equal result.
   */
  build(weather: FetchResult, atmospheric: FetchResult, soil: FetchResult): AnalysisResultCore {
    const weatherSignals: WeatherSignals = weather.ok ? this.views.weather(weather.payload) : {};
    const atmosphericSignals: AtmosphericSignals = atmospheric.ok
      ? this.views.atmospheric(atmospheric.payload)
      : { temperatureDays: 0 };
    const soilSignals: SoilPropertySignals = soil.ok ? this.views.soil(soil.payload) : {};

    const environment = this.buildEnvironment(weather.ok, weatherSignals, atmospheric.ok, atmosphericSignals);
    const soilProfile = this.buildSoil(soil.ok, soilSignals);
    const derived = this.buildDerived(soilProfile, environment);

    const quality = gradeDataQuality({
      weatherOk: weather.ok,
      atmosphericOk: atmospheric.ok,
      soilOk: soil.ok,
      environmentValid:
        environment.temperatureC.valid && environment.humidityPct.valid && environment.precipitationMm.valid,
      temperatureValid: environment.temperatureC.valid,
      compositionValid: soilProfile.composition.valid
    });

    return {
      environment,
      soil: soilProfile,
      derived,
      quality,
      sources: [
        report("openweathermap", weather),
        report("nasa-power", atmospheric),
        report("soilgrids", soil)
      ]
    };
  }

  private buildEnvironment(
    weatherOk: boolean,
    weather: WeatherSignals,
    atmosphericOk: boolean,
    atmospheric: AtmosphericSignals
  ): EnvironmentalConditions {
    return {
      temperatureC: resolveReading(
        [
          { source: "openweathermap", ok: weatherOk, value: weather.temperatureC },
          { source: "nasa-power", ok: atmosphericOk, value: atmospheric.meanTemperatureC }
        ],
        RANGES.temperature
      ),
      humidityPct: resolveReading(
        [
          { source: "openweathermap", ok: weatherOk, value: weather.humidityPct },
          { source: "nasa-power", ok: atmosphericOk, value: atmospheric.meanHumidityPct }
        ],
        RANGES.humidity
      ),
      precipitationMm: resolveReading(
        [{ source: "nasa-power", ok: atmosphericOk, value: atmospheric.meanPrecipitationMm }],
        RANGES.precipitation
      )
    };
  }

  private buildSoil(soilOk: boolean, signals: SoilPropertySignals): SoilProfile {
    const { composition: triple, allValid } = validateComposition(
      signals.clayPct,
      signals.sandPct,
      signals.siltPct
    );
    const degenerate = triple.clay === 0 && triple.sand === 0 && triple.silt === 0;
    const composition: SoilComposition = { ...triple, valid: allValid };

    const rawPh = signals.ph ?? 0;
    const ph: Reading =
      rawPh === 0
        ? { value: NEUTRAL_PH, valid: false, source: "default" }
        : { ...validate(rawPh, RANGES.ph), source: "soilgrids" };

    const organicMatterPct: Reading =
      soilOk && signals.organicCarbonGPerKg !== undefined
        ? {
            ...validate(signals.organicCarbonGPerKg * ORGANIC_CARBON_TO_MATTER, RANGES.organicMatter),
            source: "soilgrids"
          }
        : missing(RANGES.organicMatter);

    return {
      composition,
      ph,
      organicMatterPct,
      soilType: degenerate ? "Unknown" : classifySoilTexture(composition.clay, composition.sand, composition.silt)
    };
  }

  private buildDerived(soil: SoilProfile, environment: EnvironmentalConditions): DerivedEstimates {
    const nitrogen = validate(soil.organicMatterPct.value * NITROGEN_PER_ORGANIC_MATTER, RANGES.nitrogen);
    return {
      nitrogenPct: {
        value: nitrogen.value,
        valid: nitrogen.valid && soil.organicMatterPct.valid,
        source: "derived"
      },
      moisturePct: estimateMoisture(soil.composition, environment)
    };
  }
}

export const createSoilProfileBuilder = (views?: PayloadViews): SoilProfileBuilder =>
  new SoilProfileBuilder(views);

/**
 * Profile used when no source was consulted: every reading missing and the
 * verdict Insufficient.
 */
export const emptyProfileCore = (): AnalysisResultCore => ({
  environment: {
    temperatureC: missing(RANGES.temperature),
    humidityPct: missing(RANGES.humidity),
    precipitationMm: missing(RANGES.precipitation)
  },
  soil: {
    composition: { clay: 0, sand: 0, silt: 0, valid: false },
    ph: { value: NEUTRAL_PH, valid: false, source: "default" },
    organicMatterPct: missing(RANGES.organicMatter),
    soilType: "Unknown"
  },
  derived: {
    nitrogenPct: missing(RANGES.nitrogen, "derived"),
    moisturePct: missing(RANGES.moisture, "derived")
  },
  quality: "Insufficient",
  sources: []
});
