export {
  PipelineOrchestrator,
  droppedFields,
  notify,
  type PipelineOutcome,
  type PipelineCallbacks,
  type RunOptions,
  type StageRecord,
  type OrchestratorDeps,
} from "./pipeline.js";
export {
  runBatch,
  summarizeBatch,
  type BatchResult,
  type BatchSummary,
  type BatchFailure,
  type BatchOptions,
} from "./batch.js";
export * from "./types.js";
export * from "./stages/index.js";
export {
  completeJson,
  completeText,
  parseJsonPermissive,
  unwrapSingleKeyObject,
  type JsonCompletion,
  type TextCompletion,
} from "./llm.js";
