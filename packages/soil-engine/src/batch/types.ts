import type { AnalyzeOptions } from "../engine/analyzer.js";
import type { AnalysisResult } from "../schema.js";
import type { ResultStore } from "../storage/types.js";

/**
 * The part of the analyzer a batch run needs; `SoilAnalyzer` satisfies it.
 */
export interface SiteAnalyzer {
  analyze(latitude: number, longitude: number, options?: AnalyzeOptions): Promise<AnalysisResult>;
}

export interface SiteJob {
  id: string;
  latitude: number;
  longitude: number;
  /**
   * Passed through to the store with the site's result.
   */
  metadata?: Record<string, unknown>;
}

export interface SiteBatchRunnerOptions {
  analyzer: SiteAnalyzer;
  store?: ResultStore;
  runId?: string;
  now?: () => Date;
  onResult?: (context: { site: SiteJob; result: AnalysisResult; key?: string }) => void | Promise<void>;
  onFailure?: (failure: BatchFailure) => void | Promise<void>;
}

export interface BatchResult {
  processed: number;
  successes: number;
  failures: BatchFailure[];
}

export interface BatchFailure {
  site: SiteJob;
  reason: string;
  result?: AnalysisResult;
  error?: unknown;
}

export interface BatchRunner {
  run(sites: SiteJob[]): Promise<BatchResult>;
  analyzeOne(site: SiteJob): Promise<AnalysisResult>;
}
