import { schemaTask } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { isRetryable } from "../lib/errors";
import { cancelCampaignPayloadSchema, extendCampaignPayloadSchema, retryCampaignEntryPayloadSchema } from "../lib/schemas";
import { addCampaignTargets, retryCampaignEntry, stopCampaign } from "../steps/plan-campaign";
import { executeCampaignPlan } from "./execute-campaign-plan";

export const extendCampaignTask = schemaTask({
  id: "extend-campaign",
  schema: extendCampaignPayloadSchema,
  maxDuration: 120,

  run: async (payload) => {
    const { entries, duplicates } = await addCampaignTargets(payload, defaultDeps());
    if (entries.length > 0) {
      await executeCampaignPlan.trigger(
        { campaignId: payload.campaignId },
        { concurrencyKey: `campaign-${payload.campaignId}` }
      );
    }
    return { added: entries.map((entry) => entry.agencyId), duplicates };
  },
});

export const cancelCampaignTask = schemaTask({
  id: "cancel-campaign",
  schema: cancelCampaignPayloadSchema,
  maxDuration: 60,

  run: async ({ campaignId }) => {
    const cancelled = await stopCampaign(campaignId, defaultDeps());
    return { campaignId, cancelled: cancelled.map((entry) => entry.key) };
  },
});

export const retryCampaignEntryTask = schemaTask({
  id: "retry-campaign-entry",
  schema: retryCampaignEntryPayloadSchema,
  maxDuration: 60,

  catchError: async ({ error }) => {
    if (!isRetryable(error)) return { skipRetrying: true };
  },

  run: async (payload) => {
    const entry = await retryCampaignEntry(payload, defaultDeps());
    await executeCampaignPlan.trigger(
      { campaignId: payload.campaignId },
      { concurrencyKey: `campaign-${payload.campaignId}` }
    );
    return { campaignId: payload.campaignId, key: entry.key, dueAt: entry.dueAt };
  },
});
