/**
 * Plan Campaign Steps
 *
 * Creating, extending, retrying and cancelling campaigns. Planning resolves
 * the filer from the user's organizations once; nothing is persisted when the
 * filer is still ambiguous.
 */

import { randomUUID } from "node:crypto";
import { cancelCampaign, extendCampaign, planCampaign, retryEntry, type PlanOutcome } from "../lib/campaign-orchestrator";
import { requireCampaign } from "../lib/campaign-store";
import type { EngineDeps } from "../lib/engine";
import { InvalidInput } from "../lib/errors";
import type { ExtendCampaignPayload, RetryCampaignEntryPayload, StartCampaignPayload } from "../lib/schemas";
import type { DuplicateTarget, PlanEntry } from "../lib/types";

export async function startCampaign(input: StartCampaignPayload, deps: EngineDeps, campaignId: string = randomUUID()): Promise<PlanOutcome> {
  const organizations = await deps.platform.listUserOrganizations();
  if (input.organizationId !== undefined && !organizations.some((org) => org.id === input.organizationId)) {
    throw new InvalidInput(`Organization ${input.organizationId} is not one of the user's organizations`, {
      organizationId: input.organizationId,
      available: organizations.map((org) => org.id),
    });
  }
  const outcome = planCampaign({
    campaignId,
    title: input.title,
    body: input.body,
    targets: input.targets,
    organizations,
    organizationHint: input.organizationHint,
    organizationId: input.organizationId,
    staggerIntervalMs: input.staggerIntervalMs,
    startAt: input.startAt ? new Date(input.startAt) : deps.now(),
    embargo: input.embargo,
  });

  if (outcome.kind === "needs_organization") {
    deps.logger.info("Campaign needs an organization choice", { selection: outcome.selection.kind });
    return outcome;
  }
  await deps.store.saveCampaign(outcome.campaign);
  deps.logger.info("Campaign planned", {
    campaignId,
    entries: outcome.campaign.entries.length,
    duplicates: outcome.duplicates.length,
    organizationId: outcome.campaign.organizationId,
  });
  return outcome;
}

export async function addCampaignTargets(
  input: ExtendCampaignPayload,
  deps: EngineDeps
): Promise<{ entries: PlanEntry[]; duplicates: DuplicateTarget[] }> {
  const campaign = await requireCampaign(deps.store, input.campaignId);
  const requests = await deps.store.listRequests({ campaignId: campaign.id });
  const result = extendCampaign(campaign, requests, input.targets, deps.now());
  await deps.store.saveCampaign(campaign);
  deps.logger.info("Campaign extended", {
    campaignId: campaign.id,
    added: result.entries.length,
    duplicates: result.duplicates.length,
  });
  return result;
}

/** Entries that left `pending` while the campaign was loaded keep their new state and are not reported. */
export async function stopCampaign(campaignId: string, deps: EngineDeps): Promise<PlanEntry[]> {
  const campaign = await requireCampaign(deps.store, campaignId);
  const candidates = cancelCampaign(campaign, deps.now());
  await deps.store.saveCampaign(campaign);

  const cancelled: PlanEntry[] = [];
  for (const entry of candidates) {
    const stored = await deps.store.updateEntry(campaign.id, entry, ["pending"]);
    if (stored) cancelled.push(stored);
  }
  deps.logger.info("Campaign cancelled", { campaignId, cancelledEntries: cancelled.length });
  return cancelled;
}

/** Puts a failed entry back in the plan, due now, with a fresh attempt budget. */
export async function retryCampaignEntry(input: RetryCampaignEntryPayload, deps: EngineDeps): Promise<PlanEntry> {
  const campaign = await requireCampaign(deps.store, input.campaignId);
  if (campaign.cancelledAt) {
    throw new InvalidInput(`Campaign ${campaign.id} was cancelled`, { campaignId: campaign.id });
  }
  const entry = retryEntry(campaign, input.key, deps.now());
  const stored = await deps.store.updateEntry(campaign.id, entry, ["failed"]);
  if (!stored) {
    throw new InvalidInput(`Plan entry ${input.key} is no longer failed`, { campaignId: campaign.id, key: input.key });
  }
  deps.logger.info("Plan entry requeued", { campaignId: campaign.id, key: stored.key, agencyId: stored.agencyId });
  return stored;
}
