/**
 * Execute Plan Entry Step
 *
 * Submits the next ready entry of a campaign plan. The entry is persisted as
 * `submitting` before the platform call, so a crash between the two leaves a
 * record the next run resubmits under the same idempotency key. Only the
 * entry being submitted is written back; a cancellation or extension that
 * lands during the platform call is kept.
 */

import {
  hasOutstandingEntries,
  markEntrySubmitting,
  nextDueAt,
  nextReadyEntry,
  recordEntryFailure,
  recordSubmission,
} from "../lib/campaign-orchestrator";
import { requireCampaign } from "../lib/campaign-store";
import type { EngineDeps } from "../lib/engine";
import { SubmissionRejected, errorMessage, isRetryable } from "../lib/errors";
import type { Campaign, FoiaRequest, PlanEntry } from "../lib/types";

export type ExecuteEntryResult =
  | { kind: "submitted"; entry: PlanEntry; request: FoiaRequest }
  | { kind: "failed"; entry: PlanEntry }
  | { kind: "idle"; nextDueAt: string | null; outstanding: boolean };

function idle(campaign: Campaign): ExecuteEntryResult {
  return {
    kind: "idle",
    nextDueAt: nextDueAt(campaign)?.toISOString() ?? null,
    outstanding: hasOutstandingEntries(campaign),
  };
}

export async function executePlanEntry(campaignId: string, deps: EngineDeps): Promise<ExecuteEntryResult> {
  const log = deps.logger.child({ campaignId });
  const campaign = await requireCampaign(deps.store, campaignId);
  const now = deps.now();

  const ready = nextReadyEntry(campaign, now);
  if (!ready) return idle(campaign);

  const claimedFrom = ready.state;
  const resumed = claimedFrom === "submitting";
  const entry = markEntrySubmitting(campaign, ready.key);
  if (!(await deps.store.updateEntry(campaign.id, entry, [claimedFrom]))) {
    log.info("Plan entry changed before it could be claimed", { key: entry.key });
    return idle(await requireCampaign(deps.store, campaignId));
  }
  log.info("Submitting plan entry", { key: entry.key, agencyId: entry.agencyId, attempt: entry.attempts, resumed });

  try {
    const request = await deps.platform.submitRequest(
      {
        title: campaign.title,
        body: campaign.body,
        agencyId: entry.agencyId,
        organizationId: campaign.organizationId,
        embargo: campaign.embargo,
      },
      entry.key
    );
    request.campaignId = campaign.id;
    await deps.store.saveRequest(request);
    recordSubmission(campaign, entry.key, request, deps.now());
    const stored = await deps.store.updateEntry(campaign.id, entry, ["submitting"]);
    log.info("Plan entry submitted", { key: entry.key, requestId: request.id });
    return { kind: "submitted", entry: stored ?? entry, request };
  } catch (error) {
    const transient = isRetryable(error);
    if (!transient && !(error instanceof SubmissionRejected)) {
      // Left in `submitting`; the next run resubmits with the same key
      log.error("Plan entry submission failed unexpectedly", { key: entry.key, error });
      throw error;
    }
    const recorded = recordEntryFailure(campaign, entry.key, errorMessage(error), {
      transient,
      now: deps.now(),
      maxAttempts: deps.config.SUBMISSION_MAX_ATTEMPTS,
    });
    const failed = (await deps.store.updateEntry(campaign.id, recorded, ["submitting"])) ?? recorded;
    log.warn("Plan entry submission failed", {
      key: entry.key,
      transient,
      state: failed.state,
      attempts: failed.attempts,
      error: errorMessage(error),
    });
    return { kind: "failed", entry: failed };
  }
}
