/**
 * Draft Appeal Letter Step
 *
 * Always renders the deterministic letter first. In "ai" mode the letter is
 * polished with generateObject(); a polished letter that drops a citation or
 * an exemption code is discarded. Any model failure falls back to the next model, then
 * to the deterministic text.
 */

import { generateObject, type LanguageModel } from "ai";
import { appealDraftModel, appealDraftOptions, fallbackDraftModel } from "../lib/ai";
import { renderAppealLetter } from "../lib/appeal-generator";
import { errorMessage } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { precedentCatalog, type PrecedentCatalog } from "../lib/precedent-catalog";
import { appealLetterSchema, type AppealLetterOutput } from "../lib/schemas";
import type { Appeal, FoiaRequest } from "../lib/types";

export type LetterSource = "template" | "ai" | "ai_fallback";

export interface DraftedLetter {
  subject: string;
  bodyText: string;
  source: LetterSource;
}

export type PolishFn = (model: "primary" | "fallback", prompt: string) => Promise<AppealLetterOutput>;

export interface DraftLetterOptions {
  mode: "template" | "ai";
  agencyName?: string;
  catalog?: PrecedentCatalog;
  logger: Logger;
  /** Replaces the model call; tests use it to stand in for the provider. */
  polish?: PolishFn;
}

function buildPolishPrompt(draft: { subject: string; bodyText: string }, agencyName: string): string {
  return `You are editing an administrative appeal of a public records denial sent to ${agencyName}.

Rewrite the draft below so it reads as a clear, firm letter from the requester.

RULES:
- Keep every case citation and statute citation exactly as written.
- Do not add any citation, case, or statute that is not in the draft.
- Keep every numbered exemption section and its exemption code.
- Plain text only, no markdown.

SUBJECT: ${draft.subject}

DRAFT:
${draft.bodyText}`;
}

async function polishWithModel(model: "primary" | "fallback", prompt: string): Promise<AppealLetterOutput> {
  const languageModel: LanguageModel = model === "primary" ? appealDraftModel() : fallbackDraftModel();
  const { object } = await generateObject({
    model: languageModel,
    schema: appealLetterSchema,
    prompt,
    ...(model === "primary" ? { providerOptions: appealDraftOptions } : {}),
  });
  return object;
}

function citationsOf(appeal: Appeal, catalog: PrecedentCatalog): string[] {
  const citations = appeal.entries.flatMap((entry) => entry.precedents.map((precedent) => precedent.citation));
  citations.push(...catalog.general.map((precedent) => precedent.citation));
  return [...new Set(citations)];
}

/** A polished letter must keep each citation the draft carries and each exemption code it argues. */
export function keepsCitations(text: string, appeal: Appeal, catalog: PrecedentCatalog = precedentCatalog): boolean {
  const citations = citationsOf(appeal, catalog);
  const codes = appeal.entries.map((entry) => entry.reason.exemptionCode);
  return [...citations, ...codes].every((required) => text.includes(required));
}

export async function draftAppealLetter(
  appeal: Appeal,
  request: FoiaRequest,
  options: DraftLetterOptions
): Promise<DraftedLetter> {
  const draft = renderAppealLetter(appeal, request, { agencyName: options.agencyName, catalog: options.catalog });
  if (options.mode === "template") return { ...draft, source: "template" };

  const prompt = buildPolishPrompt(draft, options.agencyName ?? "the agency");
  const polish = options.polish ?? polishWithModel;
  const attempts: Array<{ model: "primary" | "fallback"; source: LetterSource }> = [
    { model: "primary", source: "ai" },
    { model: "fallback", source: "ai_fallback" },
  ];

  for (const attempt of attempts) {
    try {
      const output = await polish(attempt.model, prompt);
      if (keepsCitations(output.body_text, appeal, options.catalog)) {
        return { subject: output.subject, bodyText: output.body_text, source: attempt.source };
      }
      options.logger.warn("Polished appeal dropped a citation; discarding", {
        requestId: request.id,
        model: attempt.model,
      });
    } catch (error) {
      options.logger.warn("Appeal polishing failed", {
        requestId: request.id,
        model: attempt.model,
        error: errorMessage(error),
      });
    }
  }
  return { ...draft, source: "template" };
}
