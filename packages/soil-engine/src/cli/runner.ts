import { z } from "zod";
import type { SiteAnalyzer } from "../batch/types.js";
import { SiteBatchRunner } from "../batch/runner.js";
import { describeError } from "../errors.js";
import type { NarrativeDocument } from "../narrative.js";
import { toNarrativeDocument } from "../narrative.js";
import type { AnalysisResult } from "../schema.js";
import type { ResultStore } from "../storage/types.js";

const SiteSchema = z.object({
  id: z.string().min(1),
  latitude: z.number(),
  longitude: z.number(),
  metadata: z.record(z.unknown()).optional()
});

const RunnerInputSchema = z
  .object({
    latitude: z.number().optional(),
    longitude: z.number().optional(),
    sites: z.array(SiteSchema).min(1).optional(),
    outDir: z.string().min(1).optional(),
    runId: z.string().min(1).optional(),
    format: z.enum(["result", "narrative"]).default("result")
  })
  .refine((input) => input.sites !== undefined || (input.latitude !== undefined && input.longitude !== undefined), {
    message: "Provide latitude and longitude, or a non-empty sites list"
  });

export type RunnerInput = z.infer<typeof RunnerInputSchema>;

export interface BatchSummary {
  processed: number;
  successes: number;
  failures: { id: string; reason: string }[];
}

export type RunnerOutput =
  | { ok: true; result: AnalysisResult | NarrativeDocument; key?: string }
  | { ok: true; batch: BatchSummary }
  | { ok: false; error: string; result?: AnalysisResult | NarrativeDocument; batch?: BatchSummary };

export interface RunnerDependencies {
  analyzer: SiteAnalyzer;
  createStore: (outDir: string) => ResultStore;
  now?: () => Date;
}

export interface RunnerOutcome {
  output: RunnerOutput;
  exitCode: number;
}

const parseInput = (raw: string): RunnerInput | string => {
  let json: unknown;
  try {
    json = raw ? JSON.parse(raw) : {};
  } catch (error) {
    return `Invalid JSON input: ${describeError(error)}`;
  }
  const parsed = RunnerInputSchema.safeParse(json);
  if (!parsed.success) {
    return `Invalid input: ${parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")}`;
  }
  return parsed.data;
};

/**
 * Runs the CLI request described by `raw` (stdin JSON). Exit code 1 means the
 * input was rejected or at least one analysis came back Insufficient.
 */
export const runSoilAnalysis = async (raw: string, deps: RunnerDependencies): Promise<RunnerOutcome> => {
  const input = parseInput(raw);
  if (typeof input === "string") {
    return { output: { ok: false, error: input }, exitCode: 1 };
  }

  const store = input.outDir ? deps.createStore(input.outDir) : undefined;
  const present = (result: AnalysisResult): AnalysisResult | NarrativeDocument =>
    input.format === "narrative" ? toNarrativeDocument(result) : result;

  if (input.sites) {
    const runner = new SiteBatchRunner({ analyzer: deps.analyzer, store, runId: input.runId, now: deps.now });
    const outcome = await runner.run(input.sites);
    const batch: BatchSummary = {
      processed: outcome.processed,
      successes: outcome.successes,
      failures: outcome.failures.map((failure) => ({ id: failure.site.id, reason: failure.reason }))
    };
    if (outcome.failures.length > 0) {
      return {
        output: { ok: false, error: `${outcome.failures.length} of ${outcome.processed} sites failed`, batch },
        exitCode: 1
      };
    }
    return { output: { ok: true, batch }, exitCode: 0 };
  }

  const result = await deps.analyzer.analyze(input.latitude ?? Number.NaN, input.longitude ?? Number.NaN);
  let key: string | undefined;
  if (store) {
    key = await store.write({
      result,
      runId: input.runId,
      generatedAt: (deps.now ?? (() => new Date()))().toISOString()
    });
  }

  if (result.quality === "Insufficient") {
    return {
      output: { ok: false, error: result.error ?? "No source returned usable data", result: present(result) },
      exitCode: 1
    };
  }
  return { output: { ok: true, result: present(result), ...(key ? { key } : {}) }, exitCode: 0 };
};
