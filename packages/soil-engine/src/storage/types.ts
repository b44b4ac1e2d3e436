import type { AnalysisResult } from "../schema.js";

export interface StoredResultContext {
  result: AnalysisResult;
  /**
   * Identifier of the batch or CLI run that produced the result.
   */
  runId?: string;
  /**
   * Timestamp the result was stored (ISO-8601).
   */
  generatedAt: string;
  /**
   * Caller-supplied details about the analyzed site, stored beside the result.
   */
  metadata?: Record<string, unknown>;
}

export interface ResultStore {
  /**
   * Persists the result and resolves with the key it can be read back under.
   */
  write(context: StoredResultContext): Promise<string>;
  read?(key: string): Promise<AnalysisResult | null>;
  list?(): AsyncIterable<AnalysisResult>;
}

const sanitize = (value: string): string => value.replace(/[^a-zA-Z0-9._-]+/g, "_");

export const defaultResultKey = (result: AnalysisResult): string =>
  sanitize(
    `${result.coordinate.latitude.toFixed(4)}_${result.coordinate.longitude.toFixed(4)}_${result.timestamp}`
  );
