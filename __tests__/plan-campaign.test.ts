import { describe, expect, it } from "vitest";
import { InvalidInput, NotFound } from "../trigger/lib/errors";
import { addCampaignTargets, startCampaign, stopCampaign } from "../trigger/steps/plan-campaign";
import { makeDeps } from "./helpers/fixtures";

const payload = { title: "Body camera policies", body: "Current policy.", targets: [101, 102, 101], staggerIntervalMs: 0, embargo: false };

describe("campaign planning steps", () => {
  it("stores nothing until the filer is resolved", async () => {
    const deps = makeDeps();
    deps.platform.organizations = [
      { id: 7, name: "Acme Org", ownerUserId: 1 },
      { id: 8, name: "Valley Herald", ownerUserId: 1 },
    ];

    const unresolved = await startCampaign(payload, deps, "c-1");
    expect(unresolved.kind).toBe("needs_organization");
    expect(deps.store.campaigns.size).toBe(0);

    const resolved = await startCampaign({ ...payload, organizationHint: "herald" }, deps, "c-1");
    expect(resolved.kind === "planned" && resolved.duplicates).toEqual([{ agencyId: 101, reason: "repeated_target", inputIndex: 2 }]);
    expect(deps.store.campaigns.get("c-1")?.organizationId).toBe(8);
  });

  it("files under an explicitly chosen organization", async () => {
    const deps = makeDeps();
    deps.platform.organizations = [
      { id: 7, name: "Acme Org", ownerUserId: 1 },
      { id: 9, name: "Acme Labs", ownerUserId: 1 },
    ];

    const outcome = await startCampaign({ ...payload, organizationHint: "acme", organizationId: 9 }, deps, "c-1");
    expect(outcome.kind === "planned" && outcome.selection).toEqual({
      kind: "selected",
      organization: { id: 9, name: "Acme Labs", ownerUserId: 1 },
      reason: "chosen",
    });
    expect(deps.store.campaigns.get("c-1")?.organizationId).toBe(9);
  });

  it("rejects an organization the user does not belong to", async () => {
    const deps = makeDeps();
    deps.platform.organizations = [{ id: 7, name: "Acme Org", ownerUserId: 1 }];

    await expect(startCampaign({ ...payload, organizationId: 12 }, deps, "c-1")).rejects.toBeInstanceOf(InvalidInput);
    expect(deps.store.campaigns.size).toBe(0);
  });

  it("schedules from an explicit start time", async () => {
    const deps = makeDeps();
    await startCampaign({ ...payload, startAt: "2025-03-05T09:00:00-05:00", staggerIntervalMs: 3_600_000 }, deps, "c-1");
    expect(deps.store.campaigns.get("c-1")?.entries.map((entry) => entry.dueAt)).toEqual([
      "2025-03-05T14:00:00.000Z",
      "2025-03-05T15:00:00.000Z",
    ]);
  });

  it("extends and cancels a stored campaign", async () => {
    const deps = makeDeps();
    await startCampaign(payload, deps, "c-1");

    const added = await addCampaignTargets({ campaignId: "c-1", targets: [102, 103] }, deps);
    expect(added.entries.map((entry) => entry.key)).toEqual(["c-1:2:103"]);
    expect(added.duplicates).toEqual([{ agencyId: 102, reason: "pending_entry", inputIndex: 0 }]);

    const cancelled = await stopCampaign("c-1", deps);
    expect(cancelled).toHaveLength(3);
    expect(deps.store.campaigns.get("c-1")?.cancelledAt).toBe("2025-03-03T12:00:00.000Z");
    await expect(addCampaignTargets({ campaignId: "c-1", targets: [104] }, deps)).rejects.toThrow("Campaign c-1 was cancelled");
  });

  it("reports a campaign that does not exist", async () => {
    await expect(stopCampaign("missing", makeDeps())).rejects.toBeInstanceOf(NotFound);
  });
});
