import { promises as fs, constants as fsConstants } from "node:fs";
import path from "node:path";
import type { AnalysisResult } from "../schema.js";
import type { ResultStore, StoredResultContext } from "./types.js";
import { defaultResultKey } from "./types.js";

export interface JsonFileResultStoreOptions {
  rootDir: string;
  /**
   * Produce human-readable JSON (2-space indent) when true.
   */
  pretty?: boolean;
  /**
   * Customize the key (file name without extension) for a given result.
   */
  key?: (result: AnalysisResult) => string;
}

const isMissingDirectory = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

interface StoredDocument {
  runId?: string;
  generatedAt?: string;
  metadata?: Record<string, unknown>;
  result: AnalysisResult;
}

const isStoredDocument = (value: unknown): value is StoredDocument =>
  typeof value === "object" &&
  value !== null &&
  "result" in value &&
  typeof value.result === "object" &&
  value.result !== null;

export class JsonFileResultStore implements ResultStore {
  private readonly rootDir: string;
  private readonly pretty: boolean;
  private readonly keyFn: (result: AnalysisResult) => string;

  constructor(options: JsonFileResultStoreOptions) {
    this.rootDir = options.rootDir;
    this.pretty = options.pretty ?? true;
    this.keyFn = options.key ?? defaultResultKey;
  }

  async write({ result, runId, generatedAt, metadata }: StoredResultContext): Promise<string> {
    const key = this.keyFn(result);
    const fullPath = this.keyToPath(key);
    const payload = {
      runId,
      generatedAt,
      ...(metadata ? { metadata } : {}),
      result
    };

    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, JSON.stringify(payload, null, this.pretty ? 2 : undefined), "utf8");
    return key;
  }

  async read(key: string): Promise<AnalysisResult | null> {
    const fullPath = this.keyToPath(key);
    try {
      await fs.access(fullPath, fsConstants.R_OK);
    } catch {
      return null;
    }
    const raw = await fs.readFile(fullPath, "utf8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      // a corrupt document reads as missing, as in list()
      return null;
    }
    return isStoredDocument(parsed) ? parsed.result : null;
  }

  async *list(): AsyncIterable<AnalysisResult> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.rootDir);
    } catch (error: unknown) {
      if (isMissingDirectory(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries.sort()) {
      if (!entry.endsWith(".json")) continue;
      const fullPath = path.join(this.rootDir, entry);
      const stat = await fs.lstat(fullPath);
      if (!stat.isFile()) continue;
      const raw = await fs.readFile(fullPath, "utf8");
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        // unreadable documents are skipped
        continue;
      }
      if (isStoredDocument(parsed)) {
        yield parsed.result;
      }
    }
  }

  private keyToPath(key: string): string {
    return path.join(this.rootDir, `${key}.json`);
  }
}

export const createJsonFileResultStore = (options: JsonFileResultStoreOptions): JsonFileResultStore =>
  new JsonFileResultStore(options);
