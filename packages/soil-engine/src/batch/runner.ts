import { describeError } from "../errors.js";
import type { AnalysisResult } from "../schema.js";
import type { BatchFailure, BatchResult, BatchRunner, SiteBatchRunnerOptions, SiteJob } from "./types.js";

export class SiteBatchRunner implements BatchRunner {
  private readonly now: () => Date;

  constructor(private readonly options: SiteBatchRunnerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Analyzes sites one after another. A site fails when its result is
   * Insufficient or when storing it throws; the run continues either way.
   */
  async run(sites: SiteJob[]): Promise<BatchResult> {
    const failures: BatchFailure[] = [];
    let successes = 0;

    for (const site of sites) {
      let failure: BatchFailure | undefined;
      try {
        const result = await this.analyzeOne(site);
        if (result.quality === "Insufficient") {
          failure = { site, reason: result.error ?? "No source returned usable data", result };
        }
      } catch (error: unknown) {
        failure = { site, reason: describeError(error), error };
      }

      if (failure) {
        failures.push(failure);
        if (this.options.onFailure) {
          await this.options.onFailure(failure);
        }
      } else {
        successes += 1;
      }
    }

    return {
      processed: sites.length,
      successes,
      failures
    };
  }

  async analyzeOne(site: SiteJob): Promise<AnalysisResult> {
    const result = await this.options.analyzer.analyze(site.latitude, site.longitude);

    let key: string | undefined;
    if (this.options.store) {
      key = await this.options.store.write({
        result,
        runId: this.options.runId,
        generatedAt: this.now().toISOString(),
        metadata: site.metadata
      });
    }

    if (this.options.onResult) {
      await this.options.onResult({ site, result, key });
    }

    return result;
  }
}

export const createSiteBatchRunner = (options: SiteBatchRunnerOptions): SiteBatchRunner =>
  new SiteBatchRunner(options);
