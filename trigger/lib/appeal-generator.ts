/**
 * Builds structured appeals from an agency's exemption claims.
 *
 * Generation is side-effect free: it never moves the request to `appealing`,
 * so drafts can be previewed. The caller applies that transition separately.
 */

import { InvalidInput } from "./errors";
import { normalizeExemptionCode, precedentCatalog, renderTemplate, type PrecedentCatalog } from "./precedent-catalog";
import { latestDenial } from "./request-state";
import type { Appeal, AppealEntry, DenialReason, FoiaRequest } from "./types";

export interface AppealOptions {
  catalog?: PrecedentCatalog;
  agencyName?: string;
  now?: Date;
}

export interface AppealLetter {
  subject: string;
  bodyText: string;
}

function buildEntry(
  reason: DenialReason,
  request: FoiaRequest,
  catalog: PrecedentCatalog,
  agencyName: string
): AppealEntry {
  const code = normalizeExemptionCode(reason.exemptionCode);
  const normalizedReason = { exemptionCode: code, justification: reason.justification };
  const match = catalog.lookup(code);
  if (!match) {
    return { reason: normalizedReason, matchedCode: null, precedents: [], argument: null, unmatched: true };
  }

  const vars = {
    agency: agencyName,
    code,
    justification: reason.justification.trim() || "no justification given",
    title: request.title,
  };
  return {
    reason: normalizedReason,
    matchedCode: match.matchedCode,
    precedents: match.precedents,
    argument: match.precedents.map((precedent) => renderTemplate(precedent.argument, vars)).join(" "),
    unmatched: false,
  };
}

export function generateAppeal(request: FoiaRequest, options: AppealOptions = {}): Appeal {
  if (request.status !== "rejected" && request.status !== "partial") {
    throw new InvalidInput(`Only rejected or partial requests can be appealed; request is ${request.status}`, {
      requestId: request.id,
      status: request.status,
      jurisdiction: request.jurisdiction,
    });
  }
  const denial = latestDenial(request);
  if (!denial || denial.reasons.length === 0) {
    throw new InvalidInput("No denial reasons are attached to the request", {
      requestId: request.id,
      status: request.status,
    });
  }
  const blank = denial.reasons.find((reason) => !reason.exemptionCode.trim());
  if (blank) {
    throw new InvalidInput("Denial reason is missing its exemption code", { requestId: request.id });
  }

  const catalog = options.catalog ?? precedentCatalog;
  const agencyName = options.agencyName ?? "The agency";
  const entries = denial.reasons.map((reason) => buildEntry(reason, request, catalog, agencyName));

  return {
    requestId: request.id,
    denialEventAt: denial.at,
    entries,
    unmatchedCount: entries.filter((entry) => entry.unmatched).length,
    generatedAt: (options.now ?? new Date()).toISOString(),
  };
}

/** Deterministic appeal letter. Unmatched reasons are listed for the requester to argue by hand. */
export function renderAppealLetter(
  appeal: Appeal,
  request: FoiaRequest,
  options: { agencyName?: string; catalog?: PrecedentCatalog } = {}
): AppealLetter {
  const catalog = options.catalog ?? precedentCatalog;
  const agencyName = options.agencyName ?? "the agency";
  const reference = request.id !== null ? ` (request #${request.id})` : "";
  const decision = request.status === "partial" ? "partial denial" : "denial";

  const sections: string[] = [
    `I am appealing the ${decision} of my public records request "${request.title}"${reference}, filed with ${agencyName} on ${request.filedAt.slice(0, 10)}.`,
  ];

  appeal.entries.forEach((entry, index) => {
    const heading = `${index + 1}. Exemption ${entry.reason.exemptionCode}`;
    if (entry.unmatched) {
      sections.push(`${heading}\nThe agency has not justified this withholding. Please release the records or explain in detail how the exemption applies.`);
      return;
    }
    const citations = entry.precedents.map((precedent) => `- ${precedent.citation}`).join("\n");
    sections.push(`${heading}\n${entry.argument}\n${citations}`);
  });

  const codes = appeal.entries.map((entry) => entry.reason.exemptionCode).join(", ");
  for (const precedent of catalog.general) {
    const argument = renderTemplate(precedent.argument, {
      agency: agencyName,
      code: codes,
      justification: appeal.entries.map((entry) => entry.reason.justification).join("; "),
      title: request.title,
    });
    sections.push(`${argument}\n- ${precedent.citation}`);
  }

  sections.push("I ask that the withheld records be released, with any exempt portions redacted and each redaction marked with the exemption claimed.");

  return {
    subject: `Appeal: ${request.title}${reference}`,
    bodyText: sections.join("\n\n"),
  };
}
