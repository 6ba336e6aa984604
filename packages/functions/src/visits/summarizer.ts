/**
 * Client visit summarizer
 */

import { settle } from "@carelog/core";
import type { SummarizeNotes } from "@carelog/core";
import type { GenerationOptions, TextGenerator } from "./invoke-model.js";

export const SUMMARY_GENERATION: GenerationOptions = {
  maxOutputTokens: 200,
  temperature: 0.3,
};

export const NO_SUMMARY = "No summary available.";
export const SUMMARY_ERROR = "Summary unavailable due to an error.";

/**
 * Prompt listing notes oldest first, numbered from 1
 */
export function buildSummaryPrompt(notes: readonly string[]): string {
  const numbered = notes.map((note, i) => `${i + 1}. ${note}`).join("\n");
  return (
    "You are a healthcare professional summarising a client's home-care visit notes. " +
    "Provide a concise summary (max 150 words) that highlights changes, concerns, and any " +
    "trends over time. Use clear, professional language.\n\n" +
    `Visit Notes (oldest to newest):\n${numbered}\n\nSummary:`
  );
}

export function createSummarizer(generator: TextGenerator): SummarizeNotes {
  return async (notes) => {
    if (notes.length === 0) {
      return NO_SUMMARY;
    }

    const prompt = buildSummaryPrompt(notes);
    const reply = await settle(() => generator.generate(prompt, SUMMARY_GENERATION));
    if (!reply.ok) {
      console.error("Summarisation failed:", reply.error);
      return SUMMARY_ERROR;
    }
    return reply.value.trim();
  };
}
