import type { RangeSpec } from "./ranges.js";
import { RANGES } from "./ranges.js";

export interface ValidatedValue {
  value: number;
  valid: boolean;
}

export interface CompositionTriple {
  clay: number;
  sand: number;
  silt: number;
}

export interface ValidatedComposition {
  composition: CompositionTriple;
  allValid: boolean;
}

const round2 = (value: number): number => Number(value.toFixed(2));

/**
 * Pins a reading into `range`. Missing and NaN readings are pinned to the
 * lower bound and flagged so they never pass for a plausible zero.
 */
export const validate = (value: number | null | undefined, range: RangeSpec): ValidatedValue => {
  if (value == null || Number.isNaN(value)) {
    return { value: range.low, valid: false };
  }
  if (value < range.low) {
    return { value: range.low, valid: false };
  }
  if (value > range.high) {
    return { value: range.high, valid: false };
  }
  return { value, valid: true };
};

export const validateComposition = (
  clay: number | null | undefined,
  sand: number | null | undefined,
  silt: number | null | undefined
): ValidatedComposition => {
  const checkedClay = validate(clay, RANGES.clay);
  const checkedSand = validate(sand, RANGES.sand);
  const checkedSilt = validate(silt, RANGES.silt);

  const total = checkedClay.value + checkedSand.value + checkedSilt.value;
  if (total === 0) {
    return { composition: { clay: 0, sand: 0, silt: 0 }, allValid: false };
  }

  // silt takes the remainder so the three parts sum to exactly 100
  const scale = 100 / total;
  const normClay = round2(checkedClay.value * scale);
  const normSand = Math.min(round2(checkedSand.value * scale), 100 - normClay);
  const normSilt = Math.max(0, 100 - (normClay + normSand));
  return {
    composition: { clay: normClay, sand: normSand, silt: normSilt },
    allValid: checkedClay.valid && checkedSand.valid && checkedSilt.valid
  };
};
