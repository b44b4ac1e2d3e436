/**
 * Core schema definitions for the soil and environment profile produced by
 * soilscope. Every numeric field carries its own validity flag so consumers can
 * tell a measured value from one that was clamped or synthesized.
 */

export const SOURCE_IDS = ["openweathermap", "nasa-power", "soilgrids"] as const;
export type SourceId = typeof SOURCE_IDS[number];

export const SOIL_TYPES = ["Sandy", "Clay", "Silty", "Sandy Loam", "Clay Loam", "Loam", "Unknown"] as const;
export type SoilType = typeof SOIL_TYPES[number];

/**
 * Ordered from least to most trustworthy.
 */
export const DATA_QUALITY_LEVELS = ["Insufficient", "Low", "Medium", "High"] as const;
export type DataQuality = typeof DATA_QUALITY_LEVELS[number];

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Where a reading came from. "default" marks a value substituted for a missing
 * one, "derived" a value computed from other readings, "none" a reading no
 * source supplied.
 */
export type ReadingSource = SourceId | "default" | "derived" | "none";

export interface Reading {
  readonly value: number;
  readonly valid: boolean;
  readonly source: ReadingSource;
}

export interface EnvironmentalConditions {
  readonly temperatureC: Reading;
  readonly humidityPct: Reading;
  /**
   * Mean daily precipitation over the trailing atmospheric window.
   */
  readonly precipitationMm: Reading;
}

export interface SoilComposition {
  readonly clay: number;
  readonly sand: number;
  readonly silt: number;
  /**
   * False when any component was missing or out of range, or when the
   * composition could not be normalized (all zero).
   */
  readonly valid: boolean;
}

export interface SoilProfile {
  readonly composition: SoilComposition;
  readonly ph: Reading;
  readonly organicMatterPct: Reading;
  readonly soilType: SoilType;
}

export interface DerivedEstimates {
  readonly nitrogenPct: Reading;
  readonly moisturePct: Reading;
}

export interface SourceReport {
  readonly id: SourceId;
  readonly ok: boolean;
  /**
   * Request URL with credentials redacted.
   */
  readonly url?: string;
  readonly attempts: number;
  readonly fetchedAt: string;
  readonly error?: string;
}

export interface AnalysisResultCore {
  readonly environment: EnvironmentalConditions;
  readonly soil: SoilProfile;
  readonly derived: DerivedEstimates;
  readonly quality: DataQuality;
  readonly sources: readonly SourceReport[];
}

export interface AnalysisResult extends AnalysisResultCore {
  readonly coordinate: Coordinate;
  /**
   * ISO-8601 time the result was assembled.
   */
  readonly timestamp: string;
  /**
   * Present only on error results (bad coordinate, caller abort, internal fault).
   */
  readonly error?: string;
}

export const compareQuality = (a: DataQuality, b: DataQuality): number =>
  DATA_QUALITY_LEVELS.indexOf(a) - DATA_QUALITY_LEVELS.indexOf(b);
