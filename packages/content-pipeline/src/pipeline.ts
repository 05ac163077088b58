import {
  capabilityFailure,
  createChildLogger,
  emptyArtifact,
  errorMessage,
  sleep,
  validationFailure,
  type CompletedArtifact,
  type Note,
  type StageConfig,
  type StageFailure,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import type { ResearchCache, ServiceRegistry } from "@notes-to-blog/services";
import { DEFAULT_STAGES, checkCompleted } from "./stages/index.js";
import {
  recoverable,
  type ImageStore,
  type StageContext,
  type StageDefinition,
  type StageName,
  type StageResult,
} from "./types.js";

const logger = createChildLogger({ module: "content-pipeline" });

export interface StageRecord {
  stage: StageName;
  status: "success" | "failed";
  attempts: number;
  durationMs: number;
  cost: number;
  failure?: StageFailure;
}

export type PipelineOutcome =
  | {
      status: "completed";
      sourcePath: string;
      artifact: CompletedArtifact;
      stages: StageRecord[];
      totalCost: number;
    }
  | {
      status: "failed";
      sourcePath: string;
      stage: StageName;
      failure: StageFailure;
      /** Last accepted artifact, including partial progress of the failed stage. */
      partial: WorkflowArtifact;
      attempts: number;
      stages: StageRecord[];
      totalCost: number;
    };

export interface PipelineCallbacks {
  onStageStart?: (stage: StageName, attempt: number) => void;
  onStageComplete?: (stage: StageName, record: StageRecord) => void;
  onRetry?: (stage: StageName, attempt: number, failure: StageFailure) => void;
}

export interface RunOptions {
  signal?: AbortSignal;
  callbacks?: PipelineCallbacks;
}

export interface OrchestratorDeps {
  registry: ServiceRegistry;
  cache: ResearchCache;
  config: StageConfig;
  imageStore: ImageStore;
  now?: () => Date;
  /** Defaults to the fixed blog-post workflow. */
  stages?: readonly StageDefinition[];
}

type StageRun =
  | { ok: true; artifact: WorkflowArtifact; record: StageRecord }
  | { ok: false; failure: StageFailure; partial: WorkflowArtifact; record: StageRecord };

/** Run a caller-supplied callback; a throwing callback is logged and ignored. */
export function notify(callback: string, invoke: () => void): void {
  try {
    invoke();
  } catch (err) {
    logger.warn({ callback, error: errorMessage(err) }, "Progress callback threw");
  }
}

const SCALAR_FIELDS = [
  "title",
  "description",
  "introduction",
  "conclusion",
  "category",
  "frontmatter",
  "filename",
] as const;

/**
 * Fields set on `before` that `after` no longer has. Subheadings are
 * matched by title since outline cleanup may drop or rename entries
 * before any content is attached to them.
 */
export function droppedFields(before: WorkflowArtifact, after: WorkflowArtifact): string[] {
  const dropped: string[] = SCALAR_FIELDS.filter(
    (field) => before[field] !== undefined && after[field] === undefined
  );

  for (const field of ["subheadings", "tags", "images"] as const) {
    if (before[field].length > 0 && after[field].length === 0) dropped.push(field);
  }

  const afterByTitle = new Map(after.subheadings.map((s) => [s.title, s]));
  for (const sub of before.subheadings) {
    const next = afterByTitle.get(sub.title);
    if (!next) {
      if (sub.body !== undefined || sub.image !== undefined) dropped.push(`subheadings["${sub.title}"]`);
      continue;
    }
    for (const field of ["researchNotes", "body", "image"] as const) {
      if (sub[field] !== undefined && next[field] === undefined) {
        dropped.push(`subheadings["${sub.title}"].${field}`);
      }
    }
  }
  return dropped;
}

/**
 * Drives one note through the stage list. Each stage gets a retry budget
 * for recoverable failures; fatal failures and exhausted budgets end the
 * run with a report instead of an exception.
 */
export class PipelineOrchestrator {
  private readonly stages: readonly StageDefinition[];
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.stages = deps.stages ?? DEFAULT_STAGES;
    this.now = deps.now ?? (() => new Date());
  }

  get config(): StageConfig {
    return this.deps.config;
  }

  async run(note: Note, options: RunOptions = {}): Promise<PipelineOutcome> {
    const records: StageRecord[] = [];
    let artifact = emptyArtifact();
    let totalCost = 0;

    logger.info({ sourcePath: note.sourcePath, stages: this.stages.length }, "Pipeline started");

    for (const definition of this.stages) {
      const run = await this.runStage(definition, artifact, note, options);
      records.push(run.record);
      totalCost += run.record.cost;

      if (!run.ok) {
        logger.error(
          {
            sourcePath: note.sourcePath,
            stage: definition.name,
            kind: run.failure.kind,
            error: run.failure.message,
            attempts: run.record.attempts,
          },
          "Pipeline failed"
        );
        return {
          status: "failed",
          sourcePath: note.sourcePath,
          stage: definition.name,
          failure: run.failure,
          partial: run.partial,
          attempts: run.record.attempts,
          stages: records,
          totalCost,
        };
      }
      artifact = run.artifact;
    }

    const completed = checkCompleted(artifact);
    if (!completed.ok) {
      const last = this.stages[this.stages.length - 1];
      return {
        status: "failed",
        sourcePath: note.sourcePath,
        stage: last ? last.name : "finalize",
        failure: completed.failure,
        partial: artifact,
        attempts: 0,
        stages: records,
        totalCost,
      };
    }

    logger.info({ sourcePath: note.sourcePath, filename: completed.artifact.filename, totalCost }, "Pipeline completed");

    return {
      status: "completed",
      sourcePath: note.sourcePath,
      artifact: completed.artifact,
      stages: records,
      totalCost,
    };
  }

  private async runStage(
    definition: StageDefinition,
    input: WorkflowArtifact,
    note: Note,
    { signal, callbacks }: RunOptions
  ): Promise<StageRun> {
    const { config } = this.deps;
    const maxAttempts = config.maxRetriesPerStage + 1;
    const started = Date.now();
    let working = input;
    let guidance: string | undefined;
    let cost = 0;

    const finish = (
      status: StageRecord["status"],
      attempts: number,
      failure?: StageFailure
    ): StageRecord => {
      const record: StageRecord = {
        stage: definition.name,
        status,
        attempts,
        durationMs: Date.now() - started,
        cost,
        ...(failure ? { failure } : {}),
      };
      notify("onStageComplete", () => callbacks?.onStageComplete?.(definition.name, record));
      return record;
    };

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        const failure: StageFailure = {
          kind: "Cancelled",
          message: `run cancelled before stage ${definition.name}`,
        };
        logger.warn({ sourcePath: note.sourcePath, stage: definition.name }, "Pipeline cancelled");
        return { ok: false, failure, partial: working, record: finish("failed", attempt - 1, failure) };
      }

      notify("onStageStart", () => callbacks?.onStageStart?.(definition.name, attempt));
      const context: StageContext = {
        note,
        registry: this.deps.registry,
        cache: this.deps.cache,
        config,
        imageStore: this.deps.imageStore,
        attempt,
        now: this.now,
        ...(guidance ? { guidance } : {}),
      };

      const verdict = this.judge(definition, working, await this.attempt(definition, working, context));

      if (verdict.status === "success") {
        cost += verdict.cost ?? 0;
        logger.debug({ stage: definition.name, attempt }, "Stage succeeded");
        return { ok: true, artifact: verdict.artifact, record: finish("success", attempt) };
      }

      if (verdict.status === "fatal") {
        return { ok: false, failure: verdict.failure, partial: working, record: finish("failed", attempt, verdict.failure) };
      }

      if (verdict.partial) {
        const dropped = droppedFields(working, verdict.partial);
        if (dropped.length === 0) {
          working = verdict.partial;
        } else {
          logger.warn({ stage: definition.name, dropped }, "Ignoring partial progress that removes fields");
        }
      }
      guidance = verdict.guidance ?? guidance;

      if (attempt >= maxAttempts) {
        logger.warn(
          { stage: definition.name, attempts: attempt, error: verdict.failure.message },
          "Retry budget exhausted"
        );
        return { ok: false, failure: verdict.failure, partial: working, record: finish("failed", attempt, verdict.failure) };
      }

      const delay = config.retryBackoffMs * 2 ** (attempt - 1);
      logger.warn(
        { stage: definition.name, attempt, nextRetryMs: delay, kind: verdict.failure.kind, error: verdict.failure.message },
        "Stage failed, retrying"
      );
      notify("onRetry", () => callbacks?.onRetry?.(definition.name, attempt, verdict.failure));
      await sleep(delay);
    }
  }

  /** Thrown errors become recoverable capability failures. */
  private async attempt(
    definition: StageDefinition,
    artifact: WorkflowArtifact,
    context: StageContext
  ): Promise<StageResult> {
    try {
      return await definition.run(artifact, context);
    } catch (err) {
      logger.error({ stage: definition.name, error: errorMessage(err) }, "Stage threw");
      return recoverable(capabilityFailure(`${definition.name} threw: ${errorMessage(err)}`));
    }
  }

  /** Apply the monotonic-field rule and the stage's gate to a successful result. */
  private judge(
    definition: StageDefinition,
    before: WorkflowArtifact,
    result: StageResult
  ): StageResult {
    if (result.status !== "success") return result;

    const dropped = droppedFields(before, result.artifact);
    if (dropped.length > 0) {
      return {
        status: "fatal",
        failure: validationFailure(`${definition.name} removed fields that were already set`, dropped),
      };
    }

    return definition.gate?.(result.artifact, this.deps.config) ?? result;
  }
}
