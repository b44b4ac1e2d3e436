import type { AnalysisResult, DataQuality, Reading, SoilType, SourceId } from "./schema.js";

/**
 * Plain JSON handed to a downstream narrative generator. Readings that failed
 * validation are reported as null so a summary never quotes a synthesized value.
 */
export interface NarrativeDocument {
  location: { latitude: number; longitude: number };
  observedAt: string;
  dataQuality: DataQuality;
  climate: {
    temperatureC: number | null;
    humidityPct: number | null;
    precipitationMm: number | null;
  };
  soil: {
    type: SoilType;
    clayPct: number | null;
    sandPct: number | null;
    siltPct: number | null;
    ph: number | null;
    organicMatterPct: number | null;
    nitrogenPct: number | null;
    moisturePct: number | null;
  };
  dataSources: SourceId[];
  error?: string;
}

const rounded = (value: number, digits = 2): number => Number(value.toFixed(digits));

const valueOf = (reading: Reading, digits?: number): number | null =>
  reading.valid ? rounded(reading.value, digits) : null;

export const toNarrativeDocument = (result: AnalysisResult): NarrativeDocument => {
  const { composition } = result.soil;
  const texture = (value: number): number | null => (composition.valid ? rounded(value) : null);

  return {
    location: { latitude: result.coordinate.latitude, longitude: result.coordinate.longitude },
    observedAt: result.timestamp,
    dataQuality: result.quality,
    climate: {
      temperatureC: valueOf(result.environment.temperatureC),
      humidityPct: valueOf(result.environment.humidityPct),
      precipitationMm: valueOf(result.environment.precipitationMm)
    },
    soil: {
      type: result.soil.soilType,
      clayPct: texture(composition.clay),
      sandPct: texture(composition.sand),
      siltPct: texture(composition.silt),
      ph: valueOf(result.soil.ph),
      organicMatterPct: valueOf(result.soil.organicMatterPct),
      nitrogenPct: valueOf(result.derived.nitrogenPct, 3),
      moisturePct: valueOf(result.derived.moisturePct)
    },
    dataSources: result.sources.filter((source) => source.ok).map((source) => source.id),
    ...(result.error ? { error: result.error } : {})
  };
};
