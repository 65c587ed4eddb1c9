/**
 * Execute Campaign Plan Task
 *
 * Walks a campaign's plan entry by entry, sleeping until the next staggered
 * (or backed-off) entry is due. Safe to re-run: entry state lives in the
 * store, and an interrupted submission is resumed under its original key.
 */

import { schemaTask, wait } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { executeCampaignPlanPayloadSchema } from "../lib/schemas";
import { executePlanEntry } from "../steps/execute-plan-entry";

export const executeCampaignPlan = schemaTask({
  id: "execute-campaign-plan",
  schema: executeCampaignPlanPayloadSchema,
  maxDuration: 600,
  queue: { name: "campaign-plans", concurrencyLimit: 5 },

  run: async ({ campaignId }) => {
    const deps = defaultDeps();
    let submitted = 0;
    let failed = 0;

    for (;;) {
      const result = await executePlanEntry(campaignId, deps);
      if (result.kind === "submitted") {
        submitted += 1;
        continue;
      }
      if (result.kind === "failed") {
        failed += 1;
        continue;
      }
      if (!result.nextDueAt) {
        deps.logger.info("Campaign plan drained", { campaignId, submitted, failed });
        return { campaignId, submitted, failed };
      }
      await wait.until({ date: new Date(result.nextDueAt) });
    }
  },
});
