import type { AnalysisResult } from "../schema.js";
import type { ResultStore, StoredResultContext } from "./types.js";
import { defaultResultKey } from "./types.js";

export class MemoryResultStore implements ResultStore {
  private readonly store = new Map<string, StoredResultContext>();

  constructor(private readonly keyFn: (result: AnalysisResult) => string = defaultResultKey) {}

  async write(context: StoredResultContext): Promise<string> {
    const key = this.keyFn(context.result);
    this.store.set(key, context);
    return key;
  }

  async read(key: string): Promise<AnalysisResult | null> {
    return this.store.get(key)?.result ?? null;
  }

  async *list(): AsyncIterable<AnalysisResult> {
    for (const entry of this.store.values()) {
      yield entry.result;
    }
  }
}

export const createMemoryResultStore = (
  keyFn?: (result: AnalysisResult) => string
): MemoryResultStore => new MemoryResultStore(keyFn);
