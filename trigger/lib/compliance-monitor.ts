import { computeDeadline, DEFAULT_WARNING_DAYS } from "./deadlines";
import { jurisdictionRules, type JurisdictionRules } from "./jurisdiction-rules";
import type { ComplianceReport, ComplianceVerdict, FoiaRequest, RecommendedAction, RequestStatus } from "./types";

export interface ComplianceFilter {
  statuses?: RequestStatus[];
  campaignId?: string;
}

export interface MonitorOptions {
  now?: Date;
  warningDays?: number;
  filter?: ComplianceFilter;
  rules?: JurisdictionRules;
}

// An `appealing` request keeps its denials but is waiting on the appeal, so it gets follow-ups
function awaitsAppeal(request: FoiaRequest): boolean {
  return (request.status === "rejected" || request.status === "partial") && request.denials.length > 0;
}

export function recommendAction(verdict: ComplianceVerdict, request: FoiaRequest): RecommendedAction {
  switch (verdict) {
    case "overdue":
      return awaitsAppeal(request) ? "file_appeal" : "send_followup";
    case "due_soon":
      return "proactive_followup";
    case "on_track":
    case "not_applicable":
      return "none";
  }
}

function matchesFilter(request: FoiaRequest, filter: ComplianceFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.statuses && !filter.statuses.includes(request.status)) return false;
  if (filter.campaignId !== undefined && request.campaignId !== filter.campaignId) return false;
  return true;
}

/**
 * Verdict and recommended action for each request, in input order. Read-only:
 * callers decide whether to act on the recommendations.
 */
export function monitorCompliance(requests: readonly FoiaRequest[], options: MonitorOptions = {}): ComplianceReport[] {
  const now = options.now ?? new Date();
  const warningDays = options.warningDays ?? DEFAULT_WARNING_DAYS;
  const rules = options.rules ?? jurisdictionRules;

  return requests
    .filter((request) => matchesFilter(request, options.filter))
    .map((request) => {
      const deadline = computeDeadline(request, { now, warningDays, rules });
      return {
        requestId: request.id,
        agencyId: request.agencyId,
        status: request.status,
        deadline,
        action: recommendAction(deadline.verdict, request),
      };
    });
}

export function buildFollowupMessage(
  request: FoiaRequest,
  report: ComplianceReport,
  rules: JurisdictionRules = jurisdictionRules
): string {
  const rule = rules.get(request.jurisdiction);
  const filed = request.filedAt.slice(0, 10);

  if (report.deadline.verdict === "overdue") {
    return [
      `I am following up on my records request "${request.title}", filed on ${filed}.`,
      `Under the ${rule.name} public records law, a response was due within ${rule.responseDays} business days, by ${report.deadline.dueDate}.`,
      "Please provide the status of this request and an estimated date of completion.",
    ].join("\n\n");
  }
  return [
    `I am writing to check on my records request "${request.title}", filed on ${filed}.`,
    `The statutory response date is ${report.deadline.dueDate}. Please let me know if anything is needed from me to keep the request on schedule.`,
  ].join("\n\n");
}
