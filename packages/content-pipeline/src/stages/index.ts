import type { StageDefinition } from "../types.js";
import { runAnalyzeStage } from "./analyze.js";
import { runOutlineValidateStage } from "./outline-validate.js";
import { runResearchStage } from "./research.js";
import { runWriteIntroConclusionStage } from "./write-intro-conclusion.js";
import { runWriteSubheadingsStage } from "./write-subheadings.js";
import { runIllustrateStage } from "./illustrate.js";
import { runSelectMetadataStage } from "./select-metadata.js";
import { runFinalizeStage } from "./finalize.js";
import { metadataGate, subheadingCountGate } from "./gates.js";

export { runAnalyzeStage } from "./analyze.js";
export { runOutlineValidateStage, cleanHeading, usableHeadings } from "./outline-validate.js";
export { runResearchStage, formatResearchNotes } from "./research.js";
export { runWriteIntroConclusionStage } from "./write-intro-conclusion.js";
export { runWriteSubheadingsStage } from "./write-subheadings.js";
export { runIllustrateStage, headerImagePrompt, sectionImagePrompt } from "./illustrate.js";
export {
  runSelectMetadataStage,
  normalizeTags,
  postFilename,
  formatDate,
  FALLBACK_FILENAME,
} from "./select-metadata.js";
export { runFinalizeStage, checkCompleted, type CompletionCheck } from "./finalize.js";
export { metadataGate, subheadingCountGate } from "./gates.js";

/**
 * analyze → outline_validate → research_each_subheading → write_intro_conclusion
 * → write_subheadings → illustrate → select_metadata → finalize
 */
export const DEFAULT_STAGES: readonly StageDefinition[] = [
  { name: "analyze", run: runAnalyzeStage, gate: subheadingCountGate },
  { name: "outline_validate", run: runOutlineValidateStage },
  { name: "research_each_subheading", run: runResearchStage },
  { name: "write_intro_conclusion", run: runWriteIntroConclusionStage },
  { name: "write_subheadings", run: runWriteSubheadingsStage },
  { name: "illustrate", run: runIllustrateStage },
  { name: "select_metadata", run: runSelectMetadataStage, gate: metadataGate },
  { name: "finalize", run: (artifact) => runFinalizeStage(artifact) },
];
