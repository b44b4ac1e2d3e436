import { z } from "zod";
import { DEFAULT_SOILGRIDS_BASE_URL } from "../config.js";
import type { ResilientFetcher } from "../http/resilient-fetcher.js";
import type { Coordinate } from "../schema.js";
import type { FetchResult, JsonObject, SourceAdapter, SourceAdapterOptions } from "./types.js";

export const SOIL_PROPERTIES = ["clay", "sand", "silt", "phh2o", "soc"] as const;
export type SoilPropertyName = typeof SOIL_PROPERTIES[number];

export interface SoilPropertyAdapterOptions extends SourceAdapterOptions {
  fetcher: ResilientFetcher;
  depth?: string;
}

/**
 * Values at the shallowest reported depth, divided by each layer's
 * `d_factor` so they read in conventional units (%, pH, g/kg).
 */
export interface SoilPropertySignals {
  clayPct?: number;
  sandPct?: number;
  siltPct?: number;
  ph?: number;
  organicCarbonGPerKg?: number;
  depthLabel?: string;
}

const LayerSchema = z.object({
  name: z.string(),
  unit_measure: z
    .object({ d_factor: z.number().positive().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  depths: z.array(z.unknown()).catch([])
});

const DepthSchema = z.object({
  label: z.string().optional().catch(undefined),
  range: z
    .object({ top_depth: z.number().finite().optional().catch(undefined) })
    .optional()
    .catch(undefined),
  values: z
    .object({ mean: z.number().finite().nullable().optional().catch(undefined) })
    .optional()
    .catch(undefined)
});

type SoilDepth = z.infer<typeof DepthSchema>;

const LayersSchema = z
  .object({
    properties: z.object({ layers: z.array(z.unknown()).catch([]) }).catch({ layers: [] })
  })
  .catch({ properties: { layers: [] } });

const shallowest = (depths: unknown[]): SoilDepth | undefined => {
  let best: SoilDepth | undefined;
  for (const entry of depths) {
    const parsed = DepthSchema.safeParse(entry);
    if (!parsed.success) continue;
    const depth = parsed.data;
    if (!best) {
      best = depth;
      continue;
    }
    const top = depth.range?.top_depth;
    const bestTop = best.range?.top_depth;
    if (top !== undefined && (bestTop === undefined || top < bestTop)) {
      best = depth;
    }
  }
  return best;
};

interface LayerReading {
  value?: number;
  depthLabel?: string;
}

const readLayer = (layers: unknown[], name: SoilPropertyName): LayerReading => {
  for (const entry of layers) {
    const parsed = LayerSchema.safeParse(entry);
    if (!parsed.success || parsed.data.name !== name) continue;
    const depth = shallowest(parsed.data.depths);
    const mean = depth?.values?.mean;
    if (mean == null) {
      return { depthLabel: depth?.label };
    }
    const factor = parsed.data.unit_measure?.d_factor ?? 1;
    return { value: mean / factor, depthLabel: depth?.label };
  }
  return {};
};

export const readSoilPropertySignals = (payload: JsonObject): SoilPropertySignals => {
  const { layers } = LayersSchema.parse(payload).properties;
  const clay = readLayer(layers, "clay");
  const sand = readLayer(layers, "sand");
  const silt = readLayer(layers, "silt");
  const ph = readLayer(layers, "phh2o");
  const soc = readLayer(layers, "soc");
  return {
    clayPct: clay.value,
    sandPct: sand.value,
    siltPct: silt.value,
    ph: ph.value,
    organicCarbonGPerKg: soc.value,
    depthLabel: clay.depthLabel ?? sand.depthLabel ?? silt.depthLabel ?? ph.depthLabel ?? soc.depthLabel
  };
};

export class SoilPropertyAdapter implements SourceAdapter<SoilPropertySignals> {
  readonly id = "soilgrids";
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly depth: string;
  private readonly fetcher: ResilientFetcher;

  constructor(options: SoilPropertyAdapterOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_SOILGRIDS_BASE_URL;
    this.timeoutMs = options.timeoutMs;
    this.depth = options.depth ?? "0-5cm";
    this.fetcher = options.fetcher;
  }

  async fetch(coordinate: Coordinate): Promise<FetchResult> {
    return this.fetcher.fetch({
      endpoint: this.baseUrl,
      query: {
        lat: coordinate.latitude,
        lon: coordinate.longitude,
        property: SOIL_PROPERTIES,
        depth: this.depth,
        value: "mean"
      },
      timeoutMs: this.timeoutMs
    });
  }

  parse(payload: JsonObject): SoilPropertySignals {
    return readSoilPropertySignals(payload);
  }
}

export const createSoilPropertyAdapter = (options: SoilPropertyAdapterOptions): SoilPropertyAdapter =>
  new SoilPropertyAdapter(options);
