import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  CLASSIFY_GENERATION,
  buildClassificationPrompt,
  createClassifier,
  parseCategory,
} from "../classifier.js";
import type { TextGenerator } from "../invoke-model.js";

function fakeGenerator(reply: () => Promise<string>) {
  const generate = vi.fn(reply);
  const generator: TextGenerator = { generate };
  return { generator, generate };
}

describe("createClassifier", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns green for a blank note without calling the model", async () => {
    const { generator, generate } = fakeGenerator(async () => "RED");

    expect(await createClassifier(generator)("   ")).toBe("green");
    expect(generate).not.toHaveBeenCalled();
  });

  it("sends the trimmed note with the classification settings", async () => {
    const { generator, generate } = fakeGenerator(async () => " RED\n");

    const category = await createClassifier(generator)("  Found on the floor after a fall  ");

    expect(category).toBe("red");
    expect(generate).toHaveBeenCalledWith(
      buildClassificationPrompt("Found on the floor after a fall"),
      CLASSIFY_GENERATION
    );
    expect(CLASSIFY_GENERATION).toEqual({ maxOutputTokens: 10, temperature: 0.1 });
  });

  it("falls back to amber on an unrecognised reply", async () => {
    const { generator } = fakeGenerator(async () => "  Unsure ");

    expect(await createClassifier(generator)("Client seemed quiet")).toBe("amber");
    expect(console.warn).toHaveBeenCalledWith(
      'Unexpected classification response: "Unsure", defaulting to amber'
    );
  });

  it("falls back to amber when the model call fails", async () => {
    const { generator } = fakeGenerator(async () => {
      throw new Error("ThrottlingException");
    });

    expect(await createClassifier(generator)("Client seemed quiet")).toBe("amber");
  });
});

describe("parseCategory", () => {
  it("is case-insensitive", () => {
    expect(parseCategory("Green")).toBe("green");
  });

  it("checks red before amber before green", () => {
    expect(parseCategory("AMBER or GREEN")).toBe("amber");
    expect(parseCategory("green, maybe red")).toBe("red");
  });

  it("returns null when no category is named", () => {
    expect(parseCategory("none")).toBeNull();
  });
});

describe("buildClassificationPrompt", () => {
  it("quotes the note and asks for a single category", () => {
    const prompt = buildClassificationPrompt("  Ate well  ");

    expect(prompt).toContain('Visit Note: "Ate well"');
    expect(prompt.endsWith("Classification (respond with only RED, AMBER, or GREEN):")).toBe(true);
  });
});
