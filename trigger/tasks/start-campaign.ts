/**
 * Start Campaign Task
 *
 * Plans a multi-agency campaign and hands it to execute-campaign-plan. When
 * the filer cannot be resolved from the hint, nothing is stored and the
 * selection is returned so the caller can choose.
 */

import { schemaTask } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { startCampaignPayloadSchema } from "../lib/schemas";
import { startCampaign } from "../steps/plan-campaign";
import { executeCampaignPlan } from "./execute-campaign-plan";

export const startCampaignTask = schemaTask({
  id: "start-campaign",
  schema: startCampaignPayloadSchema,
  maxDuration: 120,

  run: async (payload) => {
    const deps = defaultDeps();
    const outcome = await startCampaign(payload, deps);
    if (outcome.kind === "needs_organization") {
      return { status: "needs_organization" as const, selection: outcome.selection };
    }

    const campaignId = outcome.campaign.id;
    await executeCampaignPlan.trigger(
      { campaignId },
      { idempotencyKey: `campaign-plan:${campaignId}`, concurrencyKey: `campaign-${campaignId}` }
    );
    return {
      status: "planned" as const,
      campaignId,
      entries: outcome.campaign.entries.length,
      duplicates: outcome.duplicates,
    };
  },
});
