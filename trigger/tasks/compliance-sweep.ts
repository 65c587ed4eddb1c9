/**
 * Compliance Sweep (scheduled)
 *
 * Weekdays only: the follow-up cadence counts business days past due, and a
 * weekend run would repeat Friday's count. Each run also queues a status sync
 * for every open request, so the next sweep works from fresh platform data.
 */

import { schedules } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { runComplianceSweep } from "../steps/run-compliance-sweep";
import { requestConcurrencyKey } from "./queues";
import { syncRequestStatusTask } from "./sync-request-status";

const SYNC_BATCH_SIZE = 100;

export const complianceSweep = schedules.task({
  id: "compliance-sweep",
  cron: { pattern: "0 14 * * 1-5", timezone: "America/New_York" },
  maxDuration: 600,

  run: async () => {
    const result = await runComplianceSweep(defaultDeps());

    const requestIds = result.reports.flatMap((report) => (report.requestId === null ? [] : [report.requestId]));
    for (let start = 0; start < requestIds.length; start += SYNC_BATCH_SIZE) {
      await syncRequestStatusTask.batchTrigger(
        requestIds.slice(start, start + SYNC_BATCH_SIZE).map((requestId) => ({
          payload: { requestId },
          options: { concurrencyKey: requestConcurrencyKey(requestId) },
        }))
      );
    }
    return {
      requests: result.reports.length,
      attentionNeeded: result.campaigns.filter((campaign) => campaign.rollup === "attention_needed").map((c) => c.campaignId),
      followupsSent: result.followupsSent,
      followupsFailed: result.followupsFailed,
      syncsQueued: requestIds.length,
    };
  },
});
