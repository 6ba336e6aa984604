import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  NO_SUMMARY,
  SUMMARY_ERROR,
  SUMMARY_GENERATION,
  buildSummaryPrompt,
  createSummarizer,
} from "../summarizer.js";
import type { TextGenerator } from "../invoke-model.js";

describe("createSummarizer", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the no-summary sentinel for no notes without calling the model", async () => {
    const generate = vi.fn(async () => "unused");

    expect(await createSummarizer({ generate })([])).toBe(NO_SUMMARY);
    expect(NO_SUMMARY).toBe("No summary available.");
    expect(generate).not.toHaveBeenCalled();
  });

  it("returns the trimmed reply", async () => {
    const generate = vi.fn(async () => "  Mobility improving over the week.\n");
    const generator: TextGenerator = { generate };

    const summary = await createSummarizer(generator)(["Walked to the shop", "Walked further"]);

    expect(summary).toBe("Mobility improving over the week.");
    expect(generate).toHaveBeenCalledWith(
      buildSummaryPrompt(["Walked to the shop", "Walked further"]),
      SUMMARY_GENERATION
    );
    expect(SUMMARY_GENERATION).toEqual({ maxOutputTokens: 200, temperature: 0.3 });
  });

  it("returns the error sentinel when the model call fails", async () => {
    const generator: TextGenerator = {
      generate: async () => {
        throw new Error("ModelTimeoutException");
      },
    };

    expect(await createSummarizer(generator)(["note"])).toBe(SUMMARY_ERROR);
    expect(SUMMARY_ERROR).toBe("Summary unavailable due to an error.");
  });
});

describe("buildSummaryPrompt", () => {
  it("numbers notes from 1, oldest first", () => {
    const prompt = buildSummaryPrompt(["first visit", "second visit"]);

    expect(
      prompt.endsWith("Visit Notes (oldest to newest):\n1. first visit\n2. second visit\n\nSummary:")
    ).toBe(true);
    expect(prompt).toContain("max 150 words");
  });
});
