import { beforeEach, describe, expect, it } from "vitest";
import { markEntrySubmitting } from "../trigger/lib/campaign-orchestrator";
import { InvalidInput, SubmissionRejected, TransientNetworkError } from "../trigger/lib/errors";
import { executePlanEntry } from "../trigger/steps/execute-plan-entry";
import { addCampaignTargets, retryCampaignEntry, startCampaign, stopCampaign } from "../trigger/steps/plan-campaign";
import { makeAgency, makeDeps, type TestDeps } from "./helpers/fixtures";

async function storedCampaign(deps: TestDeps) {
  const campaign = await deps.store.getCampaign("c-1");
  if (!campaign) throw new Error("campaign not stored");
  return campaign;
}

describe("executePlanEntry", () => {
  let deps: TestDeps;

  async function plan(env: Record<string, string> = {}) {
    deps = makeDeps(env);
    deps.platform.addAgency(makeAgency(101, "Federal Bureau of Investigation")).addAgency(makeAgency(102, "State Police", "NY"));
    await startCampaign(
      { title: "Body camera policies", body: "Current policy.", targets: [101, 102], staggerIntervalMs: 60_000, embargo: false },
      deps,
      "c-1"
    );
  }

  beforeEach(async () => {
    await plan();
  });

  it("submits due entries one at a time and waits for the rest", async () => {
    const first = await executePlanEntry("c-1", deps);
    expect(first.kind).toBe("submitted");
    if (first.kind !== "submitted") return;
    expect(first.request.id).toBe(5001);
    expect(first.request.campaignId).toBe("c-1");
    expect(deps.store.requests.get(5001)?.campaignId).toBe("c-1");

    expect(await executePlanEntry("c-1", deps)).toEqual({
      kind: "idle",
      nextDueAt: "2025-03-03T12:01:00.000Z",
      outstanding: true,
    });

    deps.clock.now = new Date("2025-03-03T12:01:00.000Z");
    const second = await executePlanEntry("c-1", deps);
    expect(second.kind === "submitted" && second.request.jurisdiction).toBe("NY");

    const campaign = await storedCampaign(deps);
    expect(campaign.members).toEqual([
      { requestId: 5001, agencyId: 101, position: 0 },
      { requestId: 5002, agencyId: 102, position: 1 },
    ]);
    expect(await executePlanEntry("c-1", deps)).toEqual({ kind: "idle", nextDueAt: null, outstanding: false });
    expect(deps.platform.submitCalls.map((call) => call.idempotencyKey)).toEqual(["c-1:0:101", "c-1:1:102"]);
  });

  it("resubmits an interrupted entry under the same key without a second request", async () => {
    const campaign = await storedCampaign(deps);
    const entry = markEntrySubmitting(campaign, "c-1:0:101");
    await deps.store.updateEntry("c-1", entry, ["pending"]);
    // The platform accepted the request, then the worker died before recording it
    await deps.platform.submitRequest(
      { title: campaign.title, body: campaign.body, agencyId: 101, organizationId: null, embargo: false },
      entry.key
    );

    const result = await executePlanEntry("c-1", deps);
    expect(result.kind === "submitted" && result.request.id).toBe(5001);
    expect(result.kind === "submitted" && result.entry.attempts).toBe(2);
    expect(deps.platform.submitted.size).toBe(1);
    expect(deps.platform.submitCalls.map((call) => call.idempotencyKey)).toEqual(["c-1:0:101", "c-1:0:101"]);
  });

  it("leaves the entry in submitting when the failure is unexpected", async () => {
    deps.platform.submitFailures.set(101, [new Error("socket hang up")]);
    await expect(executePlanEntry("c-1", deps)).rejects.toThrow("socket hang up");

    const campaign = await storedCampaign(deps);
    expect(campaign.entries[0]).toMatchObject({ state: "submitting", attempts: 1 });
  });

  it("backs off a transient failure without touching other entries", async () => {
    deps.platform.submitFailures.set(101, [new TransientNetworkError("POST requests/ returned 503", 503)]);
    const result = await executePlanEntry("c-1", deps);
    expect(result).toMatchObject({
      kind: "failed",
      entry: { state: "pending", attempts: 1, dueAt: "2025-03-03T12:01:00.000Z", lastError: "POST requests/ returned 503" },
    });

    const campaign = await storedCampaign(deps);
    expect(campaign.entries.map((entry) => entry.state)).toEqual(["pending", "pending"]);
  });

  it("gives up once the attempt limit is reached", async () => {
    await plan({ SUBMISSION_MAX_ATTEMPTS: "1" });
    deps.platform.submitFailures.set(101, [new TransientNetworkError("timeout", null)]);
    const result = await executePlanEntry("c-1", deps);
    expect(result.kind === "failed" && result.entry.state).toBe("failed");
  });

  it("requeues a failed entry and submits it on the next run", async () => {
    await plan({ SUBMISSION_MAX_ATTEMPTS: "1" });
    deps.platform.submitFailures.set(101, [new TransientNetworkError("timeout", null)]);
    await executePlanEntry("c-1", deps);

    deps.clock.now = new Date("2025-03-03T12:00:30.000Z");
    const requeued = await retryCampaignEntry({ campaignId: "c-1", key: "c-1:0:101" }, deps);
    expect(requeued).toMatchObject({ state: "pending", attempts: 0, dueAt: "2025-03-03T12:00:30.000Z" });

    const result = await executePlanEntry("c-1", deps);
    expect(result.kind === "submitted" && result.request.agencyId).toBe(101);
  });

  it("only requeues failed entries of a live campaign", async () => {
    await expect(retryCampaignEntry({ campaignId: "c-1", key: "c-1:0:101" }, deps)).rejects.toThrow(
      "Only failed entries can be retried; c-1:0:101 is pending"
    );
    await stopCampaign("c-1", deps);
    await expect(retryCampaignEntry({ campaignId: "c-1", key: "c-1:1:102" }, deps)).rejects.toBeInstanceOf(InvalidInput);
  });

  it("records a rejection as final and moves on to the next agency", async () => {
    deps.platform.submitFailures.set(101, [new SubmissionRejected("Agency does not accept requests")]);
    const rejected = await executePlanEntry("c-1", deps);
    expect(rejected).toMatchObject({ kind: "failed", entry: { state: "rejected", lastError: "Agency does not accept requests" } });

    deps.clock.now = new Date("2025-03-03T12:01:00.000Z");
    const next = await executePlanEntry("c-1", deps);
    expect(next.kind === "submitted" && next.request.agencyId).toBe(102);
    expect(deps.platform.submitCalls).toHaveLength(2);
  });

  it("keeps a cancellation that lands while an entry is being submitted", async () => {
    deps.platform.beforeSubmit = async () => {
      await stopCampaign("c-1", deps);
    };
    const first = await executePlanEntry("c-1", deps);
    expect(first.kind === "submitted" && first.entry.state).toBe("submitted");

    const campaign = await storedCampaign(deps);
    expect(campaign.cancelledAt).toBe("2025-03-03T12:00:00.000Z");
    expect(campaign.entries.map((entry) => entry.state)).toEqual(["submitted", "cancelled"]);

    deps.platform.beforeSubmit = null;
    deps.clock.now = new Date("2025-03-03T12:01:00.000Z");
    expect(await executePlanEntry("c-1", deps)).toEqual({ kind: "idle", nextDueAt: null, outstanding: false });
    expect(deps.platform.submitCalls.map((call) => call.input.agencyId)).toEqual([101]);
  });

  it("cancels a backed-off entry when the campaign was cancelled during the call", async () => {
    deps.platform.beforeSubmit = async () => {
      await stopCampaign("c-1", deps);
    };
    deps.platform.submitFailures.set(101, [new TransientNetworkError("POST requests/ returned 503", 503)]);

    const result = await executePlanEntry("c-1", deps);
    expect(result).toMatchObject({ kind: "failed", entry: { state: "cancelled", attempts: 1 } });
    const campaign = await storedCampaign(deps);
    expect(campaign.entries.map((entry) => entry.state)).toEqual(["cancelled", "cancelled"]);
  });

  it("keeps targets added while an entry is being submitted", async () => {
    deps.platform.beforeSubmit = async () => {
      await addCampaignTargets({ campaignId: "c-1", targets: [103] }, deps);
    };
    await executePlanEntry("c-1", deps);

    const campaign = await storedCampaign(deps);
    expect(campaign.entries.map((entry) => [entry.key, entry.state])).toEqual([
      ["c-1:0:101", "submitted"],
      ["c-1:1:102", "pending"],
      ["c-1:2:103", "pending"],
    ]);
  });

  it("never lets a stale campaign copy undo a cancellation", async () => {
    const stale = await storedCampaign(deps);
    await stopCampaign("c-1", deps);
    await deps.store.saveCampaign(stale);

    const campaign = await storedCampaign(deps);
    expect(campaign.cancelledAt).toBe("2025-03-03T12:00:00.000Z");
    expect(campaign.entries.map((entry) => entry.state)).toEqual(["cancelled", "cancelled"]);
    expect(await executePlanEntry("c-1", deps)).toEqual({ kind: "idle", nextDueAt: null, outstanding: false });
    expect(deps.platform.submitCalls).toHaveLength(0);
  });
});
