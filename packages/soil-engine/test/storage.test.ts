import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AnalysisResult } from "../src/schema.js";
import { createJsonFileResultStore, createMemoryResultStore, defaultResultKey } from "../src/storage/index.js";
import { makeResult } from "./helpers/fixtures.js";

const collect = async (iterable: AsyncIterable<AnalysisResult>): Promise<AnalysisResult[]> => {
  const items: AnalysisResult[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
};

describe("defaultResultKey", () => {
  it("combines the rounded coordinate with a file-safe timestamp", () => {
    expect(defaultResultKey(makeResult())).toBe("12.3457_-45.6000_2024-03-10T12_00_00.000Z");
  });
});

describe("MemoryResultStore", () => {
  it("stores and lists results", async () => {
    const store = createMemoryResultStore();
    const first = makeResult();
    const second = makeResult({ coordinate: { latitude: 1, longitude: 2 } });

    const key = await store.write({ result: first, generatedAt: "2024-03-10T12:00:01.000Z" });
    await store.write({ result: second, generatedAt: "2024-03-10T12:00:02.000Z" });

    expect(await store.read(key)).toBe(first);
    expect(await store.read("missing")).toBeNull();
    expect(await collect(store.list())).toEqual([first, second]);
  });
});

describe("JsonFileResultStore", () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "soilscope-store-"));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("writes the result with its run metadata", async () => {
    const store = createJsonFileResultStore({ rootDir });
    const result = makeResult();

    const key = await store.write({ result, runId: "run-1", generatedAt: "2024-03-10T12:00:01.000Z" });

    expect(key).toBe("12.3457_-45.6000_2024-03-10T12_00_00.000Z");
    const stored: unknown = JSON.parse(await readFile(path.join(rootDir, `${key}.json`), "utf8"));
    expect(stored).toEqual({ runId: "run-1", generatedAt: "2024-03-10T12:00:01.000Z", result });
    expect(await store.read(key)).toEqual(result);
  });

  it("returns null for an unknown key", async () => {
    const store = createJsonFileResultStore({ rootDir });
    expect(await store.read("missing")).toBeNull();
  });

  it("returns null for a corrupt document", async () => {
    const store = createJsonFileResultStore({ rootDir });
    await writeFile(path.join(rootDir, "broken.json"), "{not json", "utf8");

    expect(await store.read("broken")).toBeNull();
  });

  it("writes site metadata when given", async () => {
    const store = createJsonFileResultStore({ rootDir, pretty: false });
    const result = makeResult();

    const key = await store.write({
      result,
      generatedAt: "2024-03-10T12:00:01.000Z",
      metadata: { owner: "north-field" }
    });

    const stored: unknown = JSON.parse(await readFile(path.join(rootDir, `${key}.json`), "utf8"));
    expect(stored).toEqual({ generatedAt: "2024-03-10T12:00:01.000Z", metadata: { owner: "north-field" }, result });
  });

  it("lists stored results in key order and skips unreadable files", async () => {
    const store = createJsonFileResultStore({ rootDir, key: (result) => `site-${result.coordinate.latitude}` });
    const second = makeResult({ coordinate: { latitude: 2, longitude: 0 } });
    const first = makeResult({ coordinate: { latitude: 1, longitude: 0 } });
    await store.write({ result: second, generatedAt: "2024-03-10T12:00:00.000Z" });
    await store.write({ result: first, generatedAt: "2024-03-10T12:00:00.000Z" });
    await writeFile(path.join(rootDir, "broken.json"), "{not json", "utf8");
    await writeFile(path.join(rootDir, "notes.txt"), "ignored", "utf8");

    const listed = await collect(store.list());

    expect(listed.map((result) => result.coordinate.latitude)).toEqual([1, 2]);
  });

  it("lists nothing when the directory does not exist", async () => {
    const store = createJsonFileResultStore({ rootDir: path.join(rootDir, "absent") });
    expect(await collect(store.list())).toEqual([]);
  });
});
