import {
  capabilityFailure,
  createChildLogger,
  emptyArtifact,
  errorMessage,
  mapWithConcurrency,
  type FailureKind,
  type Note,
} from "@notes-to-blog/core";
import { notify, type PipelineOrchestrator, type PipelineOutcome, type RunOptions } from "./pipeline.js";
import type { StageName } from "./types.js";

const logger = createChildLogger({ module: "content-pipeline:batch" });

export interface BatchFailure {
  sourcePath: string;
  stage: StageName;
  kind: FailureKind;
  message: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  failures: BatchFailure[];
  totalCost: number;
  durationMs: number;
}

export interface BatchResult {
  /** One outcome per input note, in input order. */
  outcomes: PipelineOutcome[];
  summary: BatchSummary;
}

export interface BatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
  callbacks?: RunOptions["callbacks"];
  onNoteStart?: (note: Note, index: number) => void;
  onNoteComplete?: (outcome: PipelineOutcome, index: number) => void;
}

export function summarizeBatch(outcomes: PipelineOutcome[], durationMs: number): BatchSummary {
  const failures: BatchFailure[] = outcomes.flatMap((o) =>
    o.status === "failed"
      ? [{ sourcePath: o.sourcePath, stage: o.stage, kind: o.failure.kind, message: o.failure.message }]
      : []
  );
  return {
    total: outcomes.length,
    succeeded: outcomes.filter((o) => o.status === "completed").length,
    failed: failures.filter((f) => f.kind !== "Cancelled").length,
    cancelled: failures.filter((f) => f.kind === "Cancelled").length,
    failures,
    totalCost: outcomes.reduce((sum, o) => sum + o.totalCost, 0),
    durationMs,
  };
}

/**
 * Run every note through the orchestrator with at most `concurrency`
 * notes in flight. A failed note never stops the others.
 */
export async function runBatch(
  notes: readonly Note[],
  orchestrator: Pick<PipelineOrchestrator, "run">,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const started = Date.now();
  const concurrency = Math.max(1, options.concurrency ?? 1);

  logger.info({ noteCount: notes.length, concurrency }, "Batch started");

  const outcomes = await mapWithConcurrency(notes, concurrency, async (note, index) => {
    notify("onNoteStart", () => options.onNoteStart?.(note, index));
    let outcome: PipelineOutcome;
    try {
      outcome = await orchestrator.run(note, { signal: options.signal, callbacks: options.callbacks });
    } catch (err) {
      logger.error({ sourcePath: note.sourcePath, error: errorMessage(err) }, "Orchestrator threw");
      outcome = {
        status: "failed",
        sourcePath: note.sourcePath,
        stage: "analyze",
        failure: capabilityFailure(errorMessage(err)),
        partial: emptyArtifact(),
        attempts: 0,
        stages: [],
        totalCost: 0,
      };
    }
    notify("onNoteComplete", () => options.onNoteComplete?.(outcome, index));
    return outcome;
  });

  const summary = summarizeBatch(outcomes, Date.now() - started);
  logger.info(
    { total: summary.total, succeeded: summary.succeeded, failed: summary.failed, cancelled: summary.cancelled },
    "Batch complete"
  );

  return { outcomes, summary };
}
