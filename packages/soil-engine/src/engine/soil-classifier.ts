import type { SoilType } from "../schema.js";

const isNumeric = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);

/**
 * Texture class from clay/sand/silt percentages. Thresholds are checked in a
 * fixed order and the first match wins.
 */
export const classifySoilTexture = (clay: unknown, sand: unknown, silt: unknown): SoilType => {
  if (!isNumeric(clay) || !isNumeric(sand) || !isNumeric(silt)) {
    return "Unknown";
  }
  if (sand >= 85) return "Sandy";
  if (clay >= 40) return "Clay";
  if (silt >= 80) return "Silty";
  if (sand >= 70) return "Sandy Loam";
  if (clay >= 27 && silt >= 28 && sand <= 45) return "Clay Loam";
  return "Loam";
};
