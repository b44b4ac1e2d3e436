import type { FetchResult, JsonObject } from "../http/resilient-fetcher.js";
import type { Coordinate, SourceId } from "../schema.js";

export type { FetchContext, FetchResult, JsonObject } from "../http/resilient-fetcher.js";

/**
 * A source adapter turns a coordinate into one request against its source and
 * exposes a typed view over the fields the profile builder consumes. Neither
 * method range-checks values; that happens in the builder.
 */
export interface SourceAdapter<TSignals> {
  readonly id: SourceId;
  fetch(coordinate: Coordinate): Promise<FetchResult>;
  parse(payload: JsonObject): TSignals;
}

export interface SourceAdapterOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

export const unavailableResult = (url: string, error: string, fetchedAt: string): FetchResult => ({
  payload: {},
  ok: false,
  context: { url, fetchedAt, attempts: 0, error }
});
