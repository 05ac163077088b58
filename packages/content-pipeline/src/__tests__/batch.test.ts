import { describe, it, expect, vi } from "vitest";
import { capabilityFailure, emptyArtifact, type Note } from "@notes-to-blog/core";
import { runBatch, summarizeBatch } from "../batch.js";
import type { PipelineOutcome } from "../pipeline.js";
import { DEFAULT_ANALYSIS, FakeLlm, FakeSearch, makeHarness, makeNote } from "./fakes.js";

const FOOTBALL_ANALYSIS = {
  title: "Fantasy Football Drafts",
  description: "How to draft a winning roster.",
  subheadings: ["Scouting Rookies", "Trading Late"],
};

type FailedOutcome = Extract<PipelineOutcome, { status: "failed" }>;

function failedOutcome(sourcePath: string, message = "broken"): FailedOutcome {
  return {
    status: "failed",
    sourcePath,
    stage: "analyze",
    failure: capabilityFailure(message),
    partial: emptyArtifact(),
    attempts: 1,
    stages: [],
    totalCost: 0,
  };
}

const notes = [
  makeNote("Tips for home composting: greens, browns and patience.", "inbox/one.md"),
  makeNote("Fantasy football draft strategy notes for next season.", "inbox/two.md"),
  makeNote("More composting notes: worms, bins and turning schedules.", "inbox/three.md"),
];

describe("runBatch", () => {
  it("completes the other notes when one fails fatally", async () => {
    const llm = new FakeLlm((kind, prompt) => {
      if (kind === "analysis" && prompt.includes("Fantasy football")) return FOOTBALL_ANALYSIS;
      if (kind === "metadata" && prompt.includes("Fantasy Football Drafts")) {
        return { category: "sports", tags: ["football", "drafts"] };
      }
      return undefined;
    });
    const { orchestrator } = makeHarness({ llm });

    const { outcomes, summary } = await runBatch(notes, orchestrator, { concurrency: 2 });

    expect(outcomes.map((o) => o.status)).toEqual(["completed", "failed", "completed"]);
    expect(outcomes.map((o) => o.sourcePath)).toEqual(["inbox/one.md", "inbox/two.md", "inbox/three.md"]);
    expect(summary).toMatchObject({ total: 3, succeeded: 2, failed: 1, cancelled: 0 });
    expect(summary.failures).toEqual([
      {
        sourcePath: "inbox/two.md",
        stage: "select_metadata",
        kind: "ValidationFailure",
        message: 'category "sports" is not allowed',
      },
    ]);
  });

  it("searches each repeated subheading at most once across notes", async () => {
    const search = new FakeSearch(undefined, 5);
    const { orchestrator } = makeHarness({ search });

    const { summary } = await runBatch([notes[0], notes[2]], orchestrator, { concurrency: 2 });

    expect(summary.succeeded).toBe(2);
    expect([...search.queries].sort()).toEqual([...DEFAULT_ANALYSIS.subheadings].sort());
  });

  it("reports every note as cancelled when the signal is already aborted", async () => {
    const { orchestrator, llm } = makeHarness();
    const controller = new AbortController();
    controller.abort();

    const { summary } = await runBatch(notes, orchestrator, { signal: controller.signal });

    expect(summary).toMatchObject({ total: 3, succeeded: 0, failed: 0, cancelled: 3 });
    expect(llm.calls).toHaveLength(0);
  });

  it("keeps input order whatever order notes finish in", async () => {
    const delays: Record<string, number> = { "inbox/one.md": 30, "inbox/two.md": 10, "inbox/three.md": 0 };
    const orchestrator = {
      run: vi.fn(async (note: Note) => {
        await new Promise((r) => setTimeout(r, delays[note.sourcePath]));
        return failedOutcome(note.sourcePath);
      }),
    };
    const finished: string[] = [];

    const { outcomes } = await runBatch(notes, orchestrator, {
      concurrency: 3,
      onNoteComplete: (outcome) => finished.push(outcome.sourcePath),
    });

    expect(outcomes.map((o) => o.sourcePath)).toEqual(["inbox/one.md", "inbox/two.md", "inbox/three.md"]);
    expect(finished).toEqual(["inbox/three.md", "inbox/two.md", "inbox/one.md"]);
  });

  it("isolates an orchestrator that throws", async () => {
    const orchestrator = {
      run: vi.fn(async (note: Note) => {
        if (note.sourcePath === "inbox/two.md") throw new Error("boom");
        return failedOutcome(note.sourcePath);
      }),
    };

    const { outcomes } = await runBatch(notes, orchestrator);

    expect(orchestrator.run).toHaveBeenCalledTimes(3);
    const second = outcomes[1];
    expect(second.status === "failed" && second.failure.message).toBe("boom");
  });

  it("runs every note when the note callbacks throw", async () => {
    const orchestrator = { run: vi.fn(async (note: Note) => failedOutcome(note.sourcePath)) };
    const boom = () => {
      throw new Error("callback failed");
    };

    const { summary } = await runBatch(notes, orchestrator, { onNoteStart: boom, onNoteComplete: boom });

    expect(orchestrator.run).toHaveBeenCalledTimes(3);
    expect(summary).toMatchObject({ total: 3, failed: 3 });
  });
});

describe("summarizeBatch", () => {
  it("separates cancellations from failures", () => {
    const cancelled: FailedOutcome = {
      ...failedOutcome("inbox/c.md"),
      failure: { kind: "Cancelled", message: "run cancelled before stage analyze" },
    };

    const summary = summarizeBatch([failedOutcome("inbox/a.md"), cancelled], 12);

    expect(summary).toEqual({
      total: 2,
      succeeded: 0,
      failed: 1,
      cancelled: 1,
      failures: [
        { sourcePath: "inbox/a.md", stage: "analyze", kind: "CapabilityFailure", message: "broken" },
        { sourcePath: "inbox/c.md", stage: "analyze", kind: "Cancelled", message: "run cancelled before stage analyze" },
      ],
      totalCost: 0,
      durationMs: 12,
    });
  });
});
