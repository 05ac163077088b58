import { describe, it, expect } from "vitest";
import { emptyArtifact, resolveStageConfig, type WorkflowArtifact } from "@notes-to-blog/core";
import { ok } from "@notes-to-blog/services";
import {
  cleanHeading,
  headerImagePrompt,
  metadataGate,
  normalizeTags,
  postFilename,
  runFinalizeStage,
  runOutlineValidateStage,
  runAnalyzeStage,
  runResearchStage,
  sectionImagePrompt,
  subheadingCountGate,
  usableHeadings,
} from "../stages/index.js";
import { DEFAULT_ANALYSIS, FakeLlm, FakeSearch, makeContext, searchHitsFor, timeoutResult } from "./fakes.js";

function outline(subheadings: string[]): WorkflowArtifact {
  return {
    ...emptyArtifact(),
    title: "  Tips for Home Composting ",
    description: "Turn scraps into soil.",
    subheadings: subheadings.map((title) => ({ title, sources: [] })),
  };
}

describe("outline_validate", () => {
  it("cleans headings and drops empty and duplicate subheadings", async () => {
    const result = await runOutlineValidateStage(
      outline(["## Choosing a Bin", "choosing a bin", "   ", "2. Turning   the Pile"]),
      makeContext()
    );

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.artifact.title).toBe("Tips for Home Composting");
    expect(result.artifact.subheadings.map((s) => s.title)).toEqual(["Choosing a Bin", "Turning the Pile"]);
  });

  it("is fatal when cleaning leaves too few subheadings", async () => {
    const result = await runOutlineValidateStage(outline(["Bins", "bins", "- BINS"]), makeContext());

    expect(result).toEqual({
      status: "fatal",
      failure: {
        kind: "ValidationFailure",
        message: "outline is unusable",
        details: ["1 usable subheadings, expected 2-5"],
      },
    });
  });

  it("is fatal without a description", async () => {
    const result = await runOutlineValidateStage(
      { ...outline(["One", "Two"]), description: " " },
      makeContext()
    );

    expect(result.status === "fatal" && result.failure.details).toEqual(["description is empty"]);
  });
});

describe("cleanHeading", () => {
  it.each([
    ["### Worms", "Worms"],
    ["1) Worms", "Worms"],
    ["* Worms and   bins", "Worms and bins"],
    ["Worms", "Worms"],
  ])("cleans %j", (input, expected) => {
    expect(cleanHeading(input)).toBe(expected);
  });
});

describe("usableHeadings", () => {
  it("cleans headings and keeps the first of each case-insensitive repeat", () => {
    expect(usableHeadings(["## Bins", "bins", " ", "2. Worms", "BINS"])).toEqual(["Bins", "Worms"]);
  });
});

describe("analyze", () => {
  it("returns cleaned, distinct subheadings", async () => {
    const llm = new FakeLlm((kind) =>
      kind === "analysis" ? { ...DEFAULT_ANALYSIS, subheadings: ["# Bins", "bins", "Worms"] } : undefined
    );

    const result = await runAnalyzeStage(emptyArtifact(), makeContext({ llm }));

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.artifact.subheadings).toEqual([
      { title: "Bins", sources: [] },
      { title: "Worms", sources: [] },
    ]);
    expect(subheadingCountGate(result.artifact, resolveStageConfig({ subheadingCountRange: [3, 5] }))).toMatchObject({
      status: "recoverable",
    });
  });
});

describe("research_each_subheading", () => {
  it("retries each subheading on its own budget and degrades on exhaustion", async () => {
    const search = new FakeSearch((query) => (query === "Smells" ? timeoutResult() : ok(searchHitsFor(query))));
    const context = makeContext({ search, config: { maxRetriesPerStage: 2 } });

    const result = await runResearchStage(outline(["Bins", "Smells"]), context);

    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    const [bins, smells] = result.artifact.subheadings;
    expect(bins.sources).toEqual([{ title: "About Bins", url: "https://example.com/bins" }]);
    expect(smells).toEqual({ title: "Smells", sources: [], researchNotes: "" });
    expect(search.queries.filter((q) => q === "Smells")).toHaveLength(3);
    expect(search.queries.filter((q) => q === "Bins")).toHaveLength(1);
  });

  it("serves a repeated query from the cache", async () => {
    const search = new FakeSearch();
    const context = makeContext({ search });

    await runResearchStage(outline(["Bins", "Smells"]), context);
    const second = await runResearchStage(outline(["  BINS "]), context);

    expect(search.queries).toEqual(["Bins", "Smells"]);
    expect(second.status === "success" && second.artifact.subheadings[0].researchNotes).toBe(
      "- About Bins: Notes on Bins (https://example.com/bins)"
    );
  });

  it("does not cache a failed search", async () => {
    let calls = 0;
    const search = new FakeSearch((query) => (++calls === 1 ? timeoutResult() : ok(searchHitsFor(query))));
    const context = makeContext({ search, config: { maxRetriesPerStage: 0 } });

    await runResearchStage(outline(["Bins"]), context);
    const second = await runResearchStage(outline(["Bins"]), context);

    expect(search.queries).toHaveLength(2);
    expect(second.status === "success" && second.artifact.subheadings[0].sources).toHaveLength(1);
  });
});

describe("image prompts", () => {
  it("derive only from the outline", () => {
    expect(headerImagePrompt("Worm Bins", "Compost indoors.")).toBe(
      'Blog header image for "Worm Bins". Compost indoors. Clean editorial illustration, soft natural lighting, cohesive muted palette, no text or lettering.'
    );
    expect(sectionImagePrompt("Worm Bins", "Feeding")).toBe(
      'Illustration for the section "Feeding" of a blog post titled "Worm Bins". Clean editorial illustration, soft natural lighting, cohesive muted palette, no text or lettering.'
    );
  });
});

describe("metadata helpers", () => {
  it("normalizes tags", () => {
    expect(normalizeTags([" Compost ", "compost", "", "Garden  Tips"])).toEqual(["compost", "garden tips"]);
  });

  it("derives the filename from the title slug", () => {
    expect(postFilename("Tips for Home Composting")).toBe("tips-for-home-composting.md");
    expect(postFilename("!!!")).toBe("untitled-post.md");
  });
});

describe("gates", () => {
  const config = resolveStageConfig();

  it("asks for more subheadings with guidance", () => {
    const verdict = subheadingCountGate(outline(["Only"]), config);
    expect(verdict).toEqual({
      status: "recoverable",
      failure: { kind: "ValidationFailure", message: "analysis produced 1 subheadings, expected 2-5" },
      guidance: "Return between 2 and 5 subheadings; the last answer had 1.",
    });
  });

  it("passes an in-range outline", () => {
    expect(subheadingCountGate(outline(["A", "B"]), config)).toBeUndefined();
  });

  it("is fatal for an unknown category", () => {
    const verdict = metadataGate({ ...emptyArtifact(), category: "sports", tags: ["a", "b"] }, config);
    expect(verdict?.status).toBe("fatal");
  });

  it("is recoverable for too many tags", () => {
    const verdict = metadataGate(
      { ...emptyArtifact(), category: "diy", tags: ["a", "b", "c", "d", "e", "f"] },
      config
    );
    expect(verdict?.status).toBe("recoverable");
  });
});

describe("finalize", () => {
  it("lists what is missing", async () => {
    const result = await runFinalizeStage({ ...outline(["A"]), title: "T" });

    expect(result.status).toBe("fatal");
    if (result.status !== "fatal") return;
    expect(result.failure.message).toBe("artifact is incomplete");
    expect(result.failure.details).toContain("introduction: Required");
    expect(result.failure.details).toContain("images: header image is missing");
  });
});
