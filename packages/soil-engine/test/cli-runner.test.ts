import { describe, expect, it, vi } from "vitest";
import { runSoilAnalysis } from "../src/cli/runner.js";
import type { RunnerDependencies } from "../src/cli/runner.js";
import { createMemoryResultStore } from "../src/storage/index.js";
import { FIXED_NOW, makeResult } from "./helpers/fixtures.js";

const dependencies = () => {
  const store = createMemoryResultStore();
  const deps = {
    analyzer: {
      analyze: vi.fn(async (latitude: number, longitude: number) =>
        latitude > 90
          ? makeResult({ coordinate: { latitude, longitude }, error: "Latitude must be between -90 and 90" })
          : makeResult({ coordinate: { latitude, longitude }, quality: "Medium" })
      )
    },
    createStore: vi.fn((_outDir: string) => store),
    now: () => FIXED_NOW
  } satisfies RunnerDependencies;
  return { deps, store };
};

describe("runSoilAnalysis", () => {
  it("rejects input that is not JSON", async () => {
    const { deps } = dependencies();

    const { output, exitCode } = await runSoilAnalysis("{latitude:", deps);

    expect(exitCode).toBe(1);
    expect(output.ok).toBe(false);
    expect("error" in output && output.error.startsWith("Invalid JSON input: ")).toBe(true);
    expect(deps.analyzer.analyze).not.toHaveBeenCalled();
  });

  it("requires a coordinate or a list of sites", async () => {
    const { deps } = dependencies();

    const { output, exitCode } = await runSoilAnalysis(JSON.stringify({ latitude: 10 }), deps);

    expect(exitCode).toBe(1);
    expect(output).toEqual({
      ok: false,
      error: "Invalid input: (root): Provide latitude and longitude, or a non-empty sites list"
    });
  });

  it("analyzes a single point and stores it when outDir is given", async () => {
    const { deps, store } = dependencies();

    const { output, exitCode } = await runSoilAnalysis(
      JSON.stringify({ latitude: 10, longitude: 20, outDir: "results", runId: "cli" }),
      deps
    );

    expect(exitCode).toBe(0);
    expect(deps.createStore).toHaveBeenCalledWith("results");
    expect(output).toMatchObject({ ok: true, key: "10.0000_20.0000_2024-03-10T12_00_00.000Z" });
    expect(await store.read("10.0000_20.0000_2024-03-10T12_00_00.000Z")).toMatchObject({ quality: "Medium" });
  });

  it("exits non-zero with the result when the analysis is Insufficient", async () => {
    const { deps } = dependencies();

    const { output, exitCode } = await runSoilAnalysis(JSON.stringify({ latitude: 95, longitude: 0 }), deps);

    expect(exitCode).toBe(1);
    expect(output).toMatchObject({
      ok: false,
      error: "Latitude must be between -90 and 90",
      result: { quality: "Insufficient" }
    });
  });

  it("renders the narrative document on request", async () => {
    const { deps } = dependencies();

    const { output } = await runSoilAnalysis(
      JSON.stringify({ latitude: 10, longitude: 20, format: "narrative" }),
      deps
    );

    expect(output).toMatchObject({
      ok: true,
      result: { location: { latitude: 10, longitude: 20 }, dataQuality: "Medium" }
    });
  });

  it("summarizes a batch of sites", async () => {
    const { deps } = dependencies();

    const { output, exitCode } = await runSoilAnalysis(
      JSON.stringify({
        sites: [
          { id: "field", latitude: 10, longitude: 20 },
          { id: "pole", latitude: 95, longitude: 0 }
        ]
      }),
      deps
    );

    expect(exitCode).toBe(1);
    expect(output).toEqual({
      ok: false,
      error: "1 of 2 sites failed",
      batch: {
        processed: 2,
        successes: 1,
        failures: [{ id: "pole", reason: "Latitude must be between -90 and 90" }]
      }
    });
  });
});
