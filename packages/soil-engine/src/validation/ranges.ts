export interface RangeSpec {
  readonly name: string;
  readonly low: number;
  readonly high: number;
  readonly unit: string;
}

const defineRange = (name: string, low: number, high: number, unit: string): RangeSpec =>
  Object.freeze({ name, low, high, unit });

/**
 * Physically plausible bounds for every scalar the profile stores.
 */
export const RANGES = Object.freeze({
  temperature: defineRange("temperature", -50, 60, "°C"),
  humidity: defineRange("humidity", 0, 100, "%"),
  precipitation: defineRange("precipitation", 0, 100, "mm"),
  clay: defineRange("clay", 0, 100, "%"),
  sand: defineRange("sand", 0, 100, "%"),
  silt: defineRange("silt", 0, 100, "%"),
  ph: defineRange("ph", 3, 10, "pH"),
  organicMatter: defineRange("organicMatter", 0, 30, "%"),
  nitrogen: defineRange("nitrogen", 0, 5, "%"),
  moisture: defineRange("moisture", 0, 100, "%")
});
