import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { vi } from "vitest";
import { z } from "zod";
import type { FetchResult, JsonObject } from "../../src/adapters/types.js";
import { emptyProfileCore } from "../../src/engine/profile-builder.js";
import type { AnalysisResult } from "../../src/schema.js";

const FixtureSchema = z.record(z.unknown());

const FIXTURE_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../fixtures");

export const FIXED_NOW = new Date("2024-03-10T12:00:00.000Z");

export type FixtureName = "openweather-current" | "nasa-power-daily" | "soilgrids-query";

export const loadFixture = (name: FixtureName): JsonObject => {
  const parsed: unknown = JSON.parse(readFileSync(path.join(FIXTURE_DIR, `${name}.json`), "utf8"));
  return FixtureSchema.parse(parsed);
};

export const okResult = (payload: JsonObject, url = "https://example.test/source"): FetchResult => ({
  payload,
  ok: true,
  context: { url, fetchedAt: FIXED_NOW.toISOString(), attempts: 1 }
});

export const failedResult = (error = "Request failed (503 Service Unavailable)"): FetchResult => ({
  payload: {},
  ok: false,
  context: { url: "https://example.test/source", fetchedAt: FIXED_NOW.toISOString(), attempts: 3, error }
});

export const jsonResponse = (body: unknown, status = 200, statusText = "OK"): Response =>
  new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { "Content-Type": "application/json" }
  });

/**
 * Routes requests to the fixture of whichever source the URL points at.
 */
export const fixtureFetch = () =>
  vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async (input) => {
    const url = String(input);
    if (url.includes("openweathermap")) return jsonResponse(loadFixture("openweather-current"));
    if (url.includes("power.larc")) return jsonResponse(loadFixture("nasa-power-daily"));
    if (url.includes("soilgrids")) return jsonResponse(loadFixture("soilgrids-query"));
    return jsonResponse({ message: "not found" }, 404, "Not Found");
  });

export const createSpyLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

export const makeResult = (overrides: Partial<AnalysisResult> = {}): AnalysisResult => ({
  ...emptyProfileCore(),
  coordinate: { latitude: 12.34567, longitude: -45.6 },
  timestamp: FIXED_NOW.toISOString(),
  ...overrides
});
