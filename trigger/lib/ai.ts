import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { getConfig } from "./config";

export const openai = createOpenAI({
  apiKey: process.env.OPENAI_API_KEY,
});

export const anthropic = createAnthropic({
  apiKey: process.env.ANTHROPIC_API_KEY,
});

// Appeal polishing: medium reasoning effort
export function appealDraftModel() {
  return openai(getConfig().APPEAL_DRAFT_MODEL);
}
export const appealDraftOptions = { openai: { reasoningEffort: "medium" as const } };

// Fallback
export function fallbackDraftModel() {
  return anthropic(getConfig().APPEAL_FALLBACK_MODEL);
}
