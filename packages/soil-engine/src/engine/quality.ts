import type { DataQuality } from "../schema.js";

export interface QualityInput {
  weatherOk: boolean;
  atmosphericOk: boolean;
  soilOk: boolean;
  /**
   * Temperature, humidity and precipitation all passed validation.
   */
  environmentValid: boolean;
  temperatureValid: boolean;
  compositionValid: boolean;
}

/**
 * Coarse verdict over source availability and field validity. Adding a
 * source or a valid field never lowers the level.
 */
export const gradeDataQuality = (input: QualityInput): DataQuality => {
  const available = [input.weatherOk, input.atmosphericOk, input.soilOk].filter(Boolean).length;

  if (available === 0) {
    return "Insufficient";
  }
  if (available === 3 && input.environmentValid && input.compositionValid) {
    return "High";
  }
  if (input.temperatureValid && input.compositionValid) {
    return "Medium";
  }
  return "Low";
};
