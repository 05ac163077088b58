import type {
  Note,
  StageConfig,
  StageFailure,
  WorkflowArtifact,
} from "@notes-to-blog/core";
import type {
  ImagePayload,
  ResearchCache,
  ServiceRegistry,
} from "@notes-to-blog/services";

export const STAGE_NAMES = [
  "analyze",
  "outline_validate",
  "research_each_subheading",
  "write_intro_conclusion",
  "write_subheadings",
  "illustrate",
  "select_metadata",
  "finalize",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Persists generated images and returns the path recorded in the artifact. */
export interface ImageStore {
  save(payload: ImagePayload, baseName: string): Promise<string>;
}

export interface StageContext {
  note: Note;
  registry: ServiceRegistry;
  cache: ResearchCache;
  config: StageConfig;
  imageStore: ImageStore;
  /** 1-based attempt number for the current stage. */
  attempt: number;
  /** Correction carried over from the previous failed attempt. */
  guidance?: string;
  now: () => Date;
}

export type StageResult =
  | { status: "success"; artifact: WorkflowArtifact; cost?: number }
  | {
      status: "recoverable";
      failure: StageFailure;
      /** Progress the next attempt starts from. */
      partial?: WorkflowArtifact;
      guidance?: string;
    }
  | { status: "fatal"; failure: StageFailure };

export type StageFailureResult = Exclude<StageResult, { status: "success" }>;

export type StageFn = (
  artifact: WorkflowArtifact,
  context: StageContext
) => Promise<StageResult>;

/** Post-condition checked by the orchestrator after a stage succeeds. */
export type StageGate = (
  artifact: WorkflowArtifact,
  config: StageConfig
) => StageFailureResult | undefined;

export interface StageDefinition {
  name: StageName;
  run: StageFn;
  gate?: StageGate;
}

export function success(artifact: WorkflowArtifact, cost?: number): StageResult {
  return cost === undefined ? { status: "success", artifact } : { status: "success", artifact, cost };
}

export function recoverable(
  failure: StageFailure,
  extra: { partial?: WorkflowArtifact; guidance?: string } = {}
): StageFailureResult {
  return { status: "recoverable", failure, ...extra };
}

export function fatal(failure: StageFailure): StageFailureResult {
  return { status: "fatal", failure };
}
