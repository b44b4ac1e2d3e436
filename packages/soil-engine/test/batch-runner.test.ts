import { describe, expect, it, vi } from "vitest";
import { SiteBatchRunner, createSiteBatchRunner } from "../src/batch/index.js";
import type { SiteJob } from "../src/batch/index.js";
import type { StoredResultContext } from "../src/storage/index.js";
import { createMemoryResultStore } from "../src/storage/index.js";
import { FIXED_NOW, makeResult } from "./helpers/fixtures.js";

const sites: SiteJob[] = [
  { id: "orchard", latitude: 10, longitude: 20 },
  { id: "ridge", latitude: 30, longitude: 40 },
  { id: "marsh", latitude: 50, longitude: 60 }
];

const fakeAnalyzer = () => ({
  analyze: vi.fn(async (latitude: number, longitude: number) => {
    if (latitude === 30) {
      return makeResult({ coordinate: { latitude, longitude }, error: "Analysis aborted by caller" });
    }
    if (latitude === 50) {
      throw new Error("analyzer crashed");
    }
    return makeResult({ coordinate: { latitude, longitude }, quality: "Medium" });
  })
});

describe("SiteBatchRunner", () => {
  it("stores each result and counts Insufficient and thrown sites as failures", async () => {
    const store = createMemoryResultStore();
    const onResult = vi.fn();
    const onFailure = vi.fn();
    const runner = new SiteBatchRunner({
      analyzer: fakeAnalyzer(),
      store,
      runId: "nightly",
      now: () => FIXED_NOW,
      onResult,
      onFailure
    });

    const outcome = await runner.run(sites);

    expect(outcome.processed).toBe(3);
    expect(outcome.successes).toBe(1);
    expect(outcome.failures.map((failure) => [failure.site.id, failure.reason])).toEqual([
      ["ridge", "Analysis aborted by caller"],
      ["marsh", "analyzer crashed"]
    ]);
    expect(onFailure).toHaveBeenCalledTimes(2);
    expect(onResult).toHaveBeenCalledTimes(2);
    expect(onResult).toHaveBeenCalledWith(
      expect.objectContaining({ site: sites[0], key: "10.0000_20.0000_2024-03-10T12_00_00.000Z" })
    );
    expect(await store.read("10.0000_20.0000_2024-03-10T12_00_00.000Z")).toMatchObject({ quality: "Medium" });
  });

  it("uses a default reason when an Insufficient result carries no error", async () => {
    const runner = new SiteBatchRunner({
      analyzer: { analyze: async (latitude, longitude) => makeResult({ coordinate: { latitude, longitude } }) }
    });

    const outcome = await runner.run([sites[0]]);

    expect(outcome.failures[0].reason).toBe("No source returned usable data");
    expect(outcome.failures[0].result?.quality).toBe("Insufficient");
  });

  it("analyzes one site without a store", async () => {
    const analyzer = fakeAnalyzer();
    const runner = new SiteBatchRunner({ analyzer });

    const result = await runner.analyzeOne(sites[0]);

    expect(result.quality).toBe("Medium");
    expect(analyzer.analyze).toHaveBeenCalledWith(10, 20);
  });

  it("stores site metadata beside the result", async () => {
    const write = vi.fn(async (_context: StoredResultContext) => "stored-key");
    const runner = createSiteBatchRunner({
      analyzer: fakeAnalyzer(),
      store: { write },
      runId: "nightly",
      now: () => FIXED_NOW
    });

    await runner.run([{ ...sites[0], metadata: { owner: "north-field", crop: "barley" } }]);

    expect(write).toHaveBeenCalledWith({
      result: expect.objectContaining({ quality: "Medium" }),
      runId: "nightly",
      generatedAt: "2024-03-10T12:00:00.000Z",
      metadata: { owner: "north-field", crop: "barley" }
    });
  });
});
