import {
  createChildLogger,
  mapWithConcurrency,
  sleep,
  type Subheading,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import {
  normalizeQueryKey,
  type ResearchPayload,
  type SearchClient,
  type SearchHit,
} from "@notes-to-blog/services";
import { success, type StageContext, type StageResult } from "../types.js";

const logger = createChildLogger({ module: "pipeline:research" });

// Keep each snippet short so the writing prompts stay within context limits.
const MAX_SNIPPET_CHARS = 400;

export function formatResearchNotes(hits: SearchHit[]): string {
  return hits
    .map((hit) => {
      const snippet = hit.snippet.length > MAX_SNIPPET_CHARS
        ? hit.snippet.slice(0, MAX_SNIPPET_CHARS) + "…"
        : hit.snippet;
      return `- ${hit.title}: ${snippet} (${hit.url})`;
    })
    .join("\n");
}

function degrade(sub: Subheading): Subheading {
  return { ...sub, researchNotes: sub.researchNotes ?? "", sources: sub.sources };
}

/**
 * Search with a per-subheading retry budget. Returns `undefined` once the
 * budget is spent, which the cache does not store.
 */
async function searchWithRetries(
  search: SearchClient,
  query: string,
  context: StageContext
): Promise<ResearchPayload | undefined> {
  const { config } = context;
  const maxAttempts = config.maxRetriesPerStage + 1;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await search.search(query, config.maxSearchResults, {
      timeoutMs: config.perStageTimeoutMs,
    });
    if (result.ok) return { query, hits: result.value };

    const { kind, message } = result.error;
    if (kind === "auth" || kind === "unavailable" || attempt === maxAttempts) {
      logger.warn({ query, attempt, kind, error: message }, "Giving up on search for subheading");
      return undefined;
    }

    const delay = config.retryBackoffMs * 2 ** (attempt - 1);
    logger.debug({ query, attempt, kind, nextRetryMs: delay }, "Search failed, retrying");
    await sleep(delay);
  }
  return undefined;
}

async function researchSubheading(
  sub: Subheading,
  search: SearchClient,
  context: StageContext
): Promise<Subheading> {
  // Already researched in an earlier attempt
  if (sub.researchNotes !== undefined) return sub;

  const query = sub.title;
  const lookup = await context.cache.getOrLoad(normalizeQueryKey(query), () =>
    searchWithRetries(search, query, context)
  );

  if (!lookup.entry) return degrade(sub);

  const { hits } = lookup.entry.payload;
  logger.debug({ query, source: lookup.source, hitCount: hits.length }, "Research ready");

  return {
    ...sub,
    researchNotes: formatResearchNotes(hits),
    sources: hits.map((hit) => ({ title: hit.title, url: hit.url })),
  };
}

/**
 * Research Stage: gather web research for every subheading, cache first.
 * Research failures never fail the stage; affected subheadings carry
 * empty research notes instead.
 */
export async function runResearchStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const { registry, config, note } = context;

  logger.info(
    { sourcePath: note.sourcePath, subheadingCount: artifact.subheadings.length },
    "Starting research stage"
  );

  const status = await registry.status("search");
  if (status.state === "unavailable") {
    logger.warn(
      { sourcePath: note.sourcePath, detail: status.detail },
      "Search unavailable, continuing without research"
    );
    return success({ ...artifact, subheadings: artifact.subheadings.map(degrade) });
  }

  const search = registry.get("search");
  const subheadings = await mapWithConcurrency(
    artifact.subheadings,
    config.researchConcurrency,
    (sub) => researchSubheading(sub, search, context)
  );

  const withSources = subheadings.filter((s) => s.sources.length > 0).length;
  logger.info(
    { sourcePath: note.sourcePath, withSources, withoutSources: subheadings.length - withSources },
    "Research stage complete"
  );

  return success({ ...artifact, subheadings });
}
