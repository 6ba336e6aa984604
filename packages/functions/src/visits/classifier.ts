/**
 * Visit note urgency classifier
 *
 * Any doubt resolves to amber: an unreadable reply or a failed model call
 * must never downgrade a note to green.
 */

import { CATEGORIES, isBlankNote, settle } from "@carelog/core";
import type { Category, ClassifyNote } from "@carelog/core";
import type { GenerationOptions, TextGenerator } from "./invoke-model.js";

export const CLASSIFY_GENERATION: GenerationOptions = {
  maxOutputTokens: 10,
  temperature: 0.1,
};

/** Category used when the model cannot be asked or its reply cannot be read */
export const FALLBACK_CATEGORY: Category = "amber";

export function buildClassificationPrompt(note: string): string {
  return `You are a healthcare professional reviewing care visit notes. Please classify the following visit note into one of three categories based on the level of concern:

RED: Urgent/critical issues requiring immediate attention (safety concerns, medical emergencies, serious incidents, safeguarding issues)
AMBER: Moderate concerns that need follow-up (minor health changes, care plan adjustments needed, family concerns)
GREEN: Routine visit with no significant concerns (normal care delivery, positive outcomes, standard activities)

Visit Note: "${note.trim()}"

Classification (respond with only RED, AMBER, or GREEN):`;
}

/**
 * First category keyword found in the reply, checked red → amber → green
 */
export function parseCategory(reply: string): Category | null {
  const text = reply.trim().toLowerCase();
  return CATEGORIES.find((category) => text.includes(category)) ?? null;
}

export function createClassifier(generator: TextGenerator): ClassifyNote {
  return async (note) => {
    if (isBlankNote(note)) {
      console.warn("Empty note provided for classification");
      return "green";
    }

    const prompt = buildClassificationPrompt(note);
    const reply = await settle(() => generator.generate(prompt, CLASSIFY_GENERATION));
    if (!reply.ok) {
      console.error(`Classification failed, defaulting to ${FALLBACK_CATEGORY}:`, reply.error);
      return FALLBACK_CATEGORY;
    }

    const category = parseCategory(reply.value);
    if (!category) {
      console.warn(
        `Unexpected classification response: "${reply.value.trim()}", defaulting to ${FALLBACK_CATEGORY}`
      );
      return FALLBACK_CATEGORY;
    }
    return category;
  };
}
