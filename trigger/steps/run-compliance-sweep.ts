/**
 * Run Compliance Sweep Step
 *
 * Evaluates every open request against its statutory deadline and rolls the
 * verdicts up per campaign. With AUTO_FOLLOWUP on, overdue requests without a
 * denial get a follow-up on the first business day past due and every
 * FOLLOWUP_INTERVAL_DAYS business days after that.
 */

import { campaignRollup } from "../lib/campaign-orchestrator";
import { buildFollowupMessage, monitorCompliance } from "../lib/compliance-monitor";
import type { EngineDeps } from "../lib/engine";
import { errorMessage } from "../lib/errors";
import { REQUEST_STATUSES, isTerminal } from "../lib/request-state";
import type { CampaignRollup, ComplianceReport } from "../lib/types";

export const FOLLOWUP_INTERVAL_DAYS = 5;

export interface SweepResult {
  reports: ComplianceReport[];
  campaigns: Array<{ campaignId: string; rollup: CampaignRollup }>;
  followupsSent: number[];
  followupsFailed: number[];
}

export function followupDue(report: ComplianceReport): boolean {
  if (report.action !== "send_followup") return false;
  const daysPastDue = -report.deadline.businessDaysRemaining;
  return daysPastDue >= 1 && (daysPastDue - 1) % FOLLOWUP_INTERVAL_DAYS === 0;
}

export async function runComplianceSweep(deps: EngineDeps): Promise<SweepResult> {
  const now = deps.now();
  const openStatuses = REQUEST_STATUSES.filter((status) => !isTerminal(status));
  const requests = await deps.store.listRequests({ statuses: openStatuses });
  const options = { now, warningDays: deps.config.DUE_SOON_WARNING_DAYS, rules: deps.rules };
  const reports = monitorCompliance(requests, options);

  const campaigns: SweepResult["campaigns"] = [];
  for (const campaign of await deps.store.listActiveCampaigns()) {
    const members = await deps.store.listRequests({ campaignId: campaign.id });
    const rollup = campaignRollup(campaign, monitorCompliance(members, options));
    campaigns.push({ campaignId: campaign.id, rollup });
  }

  const followupsSent: number[] = [];
  const followupsFailed: number[] = [];
  if (deps.config.AUTO_FOLLOWUP) {
    const requestById = new Map(requests.map((request) => [request.id, request]));
    for (const report of reports.filter(followupDue)) {
      const request = requestById.get(report.requestId);
      if (!request || request.id === null) continue;
      try {
        await deps.platform.postFollowup(request.id, buildFollowupMessage(request, report, deps.rules));
        followupsSent.push(request.id);
      } catch (error) {
        // One agency's failure does not stop the sweep
        deps.logger.warn("Automatic follow-up failed", { requestId: request.id, error: errorMessage(error) });
        followupsFailed.push(request.id);
      }
    }
  }

  deps.logger.info("Compliance sweep finished", {
    requests: reports.length,
    overdue: reports.filter((report) => report.deadline.verdict === "overdue").length,
    dueSoon: reports.filter((report) => report.deadline.verdict === "due_soon").length,
    campaigns: campaigns.length,
    followupsSent: followupsSent.length,
  });
  return { reports, campaigns, followupsSent, followupsFailed };
}
