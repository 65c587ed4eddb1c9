import { describe, expect, it } from "vitest";
import { planCampaign, recordSubmission } from "../trigger/lib/campaign-orchestrator";
import type { ComplianceReport, FoiaRequest } from "../trigger/lib/types";
import { followupDue, runComplianceSweep } from "../trigger/steps/run-compliance-sweep";
import { history, makeDeps, makeRequest, noon, type TestDeps } from "./helpers/fixtures";

function report(businessDaysRemaining: number, action: ComplianceReport["action"] = "send_followup"): ComplianceReport {
  return {
    requestId: 1,
    agencyId: 101,
    status: "submitted",
    deadline: { jurisdiction: "NY", dueDate: "2025-01-13", verdict: "overdue", pausedBusinessDays: 0, businessDaysRemaining },
    action,
  };
}

describe("followupDue", () => {
  it("follows up on the first business day past due and every five after", () => {
    expect([0, -1, -2, -5, -6, -7, -11].map((remaining) => followupDue(report(remaining)))).toEqual([
      false,
      true,
      false,
      false,
      true,
      false,
      true,
    ]);
  });

  it("leaves denied requests to the appeal path", () => {
    expect(followupDue(report(-1, "file_appeal"))).toBe(false);
  });
});

async function seed(deps: TestDeps): Promise<void> {
  const requests: FoiaRequest[] = [
    makeRequest({ id: 1, campaignId: "c-1" }),
    makeRequest({
      id: 2,
      status: "partial",
      statusHistory: history(["submitted", "2025-01-06"], ["processing", "2025-01-07"], ["partial", "2025-01-08"]),
      denials: [{ at: noon("2025-01-08"), status: "partial", reasons: [{ exemptionCode: "b(6)", justification: "" }] }],
    }),
    makeRequest({ id: 3, filedAt: noon("2025-01-07") }),
    makeRequest({ id: 4 }),
    makeRequest({
      id: 5,
      campaignId: "c-2",
      status: "completed",
      statusHistory: history(["submitted", "2025-01-06"], ["acknowledged", "2025-01-07"], ["completed", "2025-01-09"]),
    }),
  ];
  for (const request of requests) await deps.store.saveRequest(request);

  for (const [id, request] of [["c-1", requests[0]], ["c-2", requests[4]]] as const) {
    const outcome = planCampaign({
      campaignId: id,
      title: request.title,
      body: request.body,
      targets: [request.agencyId],
      organizations: [],
      startAt: new Date(noon("2025-01-06")),
    });
    if (outcome.kind !== "planned") throw new Error("expected a plan");
    recordSubmission(outcome.campaign, outcome.campaign.entries[0].key, request, new Date(noon("2025-01-06")));
    await deps.store.saveCampaign(outcome.campaign);
  }
}

describe("runComplianceSweep", () => {
  it("reports open requests and rolls up active campaigns", async () => {
    const deps = makeDeps({}, noon("2025-01-14"));
    await seed(deps);

    const result = await runComplianceSweep(deps);
    expect(result.reports.map((entry) => [entry.requestId, entry.deadline.verdict, entry.action])).toEqual([
      [1, "overdue", "send_followup"],
      [2, "overdue", "file_appeal"],
      [3, "due_soon", "proactive_followup"],
      [4, "overdue", "send_followup"],
    ]);
    expect(result.campaigns).toEqual([{ campaignId: "c-1", rollup: "attention_needed" }]);
    expect(result.followupsSent).toEqual([]);
    expect(deps.platform.followups).toEqual([]);
  });

  it("sends due follow-ups and keeps going past a failure", async () => {
    const deps = makeDeps({ AUTO_FOLLOWUP: "true" }, noon("2025-01-14"));
    await seed(deps);
    deps.platform.followupFailures.add(4);

    const result = await runComplianceSweep(deps);
    expect(result.followupsSent).toEqual([1]);
    expect(result.followupsFailed).toEqual([4]);
    expect(deps.platform.followups).toHaveLength(1);
    expect(deps.platform.followups[0].message.split("\n\n")).toEqual([
      'I am following up on my records request "Use of force reports", filed on 2025-01-06.',
      "Under the New York public records law, a response was due within 5 business days, by 2025-01-13.",
      "Please provide the status of this request and an estimated date of completion.",
    ]);
  });

  it("waits out the interval between follow-ups", async () => {
    const deps = makeDeps({ AUTO_FOLLOWUP: "true" }, noon("2025-01-15"));
    await seed(deps);
    // 1 and 4 are two days past due; 3 fell due yesterday
    expect((await runComplianceSweep(deps)).followupsSent).toEqual([3]);
  });
});
