/**
 * File Appeal Step
 *
 * Builds the appeal for the request's latest denial, drafts the letter and,
 * when asked to submit, posts it and moves the request to `appealing`. Each
 * denial event is appealed at most once: the post carries a key derived from
 * the denial, so a retry after a lost response does not file twice.
 */

import { generateAppeal } from "../lib/appeal-generator";
import { requireRequest, type StoredAppeal } from "../lib/campaign-store";
import type { EngineDeps } from "../lib/engine";
import { applyTransition, assertTransition } from "../lib/request-state";
import type { Appeal } from "../lib/types";
import { draftAppealLetter, type DraftedLetter, type PolishFn } from "./draft-appeal-letter";

export type FileAppealResult =
  | { kind: "preview"; appeal: Appeal; letter: DraftedLetter }
  | { kind: "filed"; appeal: StoredAppeal; letter: DraftedLetter }
  | { kind: "already_filed"; appeal: StoredAppeal };

export interface FileAppealOptions {
  submit: boolean;
  polish?: PolishFn;
}

export function appealIdempotencyKey(requestId: number, denialEventAt: string): string {
  return `appeal:${requestId}:${denialEventAt}`;
}

export async function fileAppeal(requestId: number, options: FileAppealOptions, deps: EngineDeps): Promise<FileAppealResult> {
  const log = deps.logger.child({ requestId });

  return deps.lock.run(requestId, async () => {
    const request = await requireRequest(deps.store, requestId);
    const agency = await deps.platform.lookupAgency(request.agencyId);
    const agencyName = agency?.name;

    const appeal = generateAppeal(request, { catalog: deps.catalog, agencyName, now: deps.now() });
    if (options.submit) {
      const previous = (await deps.store.listAppeals(requestId)).find(
        (stored) => stored.denialEventAt === appeal.denialEventAt
      );
      if (previous) {
        log.info("Denial already appealed", { denialEventAt: appeal.denialEventAt });
        return { kind: "already_filed", appeal: previous };
      }
    }

    const letter = await draftAppealLetter(appeal, request, {
      mode: deps.config.APPEAL_DRAFT_MODE,
      agencyName,
      catalog: deps.catalog,
      logger: log,
      polish: options.polish,
    });
    if (appeal.unmatchedCount > 0) {
      log.warn("Appeal has exemptions without precedent", {
        unmatched: appeal.entries.filter((entry) => entry.unmatched).map((entry) => entry.reason.exemptionCode),
      });
    }
    if (!options.submit) return { kind: "preview", appeal, letter };

    // Checked before posting so a letter is never sent for an appeal we cannot record
    assertTransition(request, "appealing");
    await deps.platform.postAppeal(
      requestId,
      `${letter.subject}\n\n${letter.bodyText}`,
      appealIdempotencyKey(requestId, appeal.denialEventAt)
    );

    const postedAt = deps.now().toISOString();
    applyTransition(request, "appealing", { now: deps.now });
    await deps.store.saveRequest(request);

    const stored: StoredAppeal = {
      ...appeal,
      letterSubject: letter.subject,
      letterBody: letter.bodyText,
      postedAt,
    };
    await deps.store.insertAppeal(stored);
    log.info("Appeal filed", { denialEventAt: appeal.denialEventAt, source: letter.source, entries: appeal.entries.length });
    return { kind: "filed", appeal: stored, letter };
  });
}
