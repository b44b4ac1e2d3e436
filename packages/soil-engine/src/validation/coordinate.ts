import { InvalidCoordinateError } from "../errors.js";
import type { Coordinate } from "../schema.js";

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

/**
 * Returns a frozen coordinate or throws when either axis is non-numeric or
 * outside WGS84 bounds.
 */
export const parseCoordinate = (latitude: unknown, longitude: unknown): Coordinate => {
  if (!isFiniteNumber(latitude)) {
    throw new InvalidCoordinateError(`Latitude must be a finite number, received ${String(latitude)}`);
  }
  if (!isFiniteNumber(longitude)) {
    throw new InvalidCoordinateError(`Longitude must be a finite number, received ${String(longitude)}`);
  }
  if (latitude < -90 || latitude > 90) {
    throw new InvalidCoordinateError(`Latitude must be between -90 and 90, received ${latitude}`);
  }
  if (longitude < -180 || longitude > 180) {
    throw new InvalidCoordinateError(`Longitude must be between -180 and 180, received ${longitude}`);
  }
  return Object.freeze({ latitude, longitude });
};
