import { describe, expect, it } from "vitest";
import { EmbargoActive, HistoryOrderError, InvalidInput, InvalidTransition } from "../trigger/lib/errors";
import {
  DISCLOSURE_STATUSES,
  REQUEST_STATUSES,
  TRANSITIONS,
  applyTransition,
  canTransition,
  createSubmittedRequest,
  findTransitionPath,
  isTerminal,
  latestDenial,
  liftEmbargo,
  recordDenial,
} from "../trigger/lib/request-state";
import type { RequestStatus } from "../trigger/lib/types";
import { makeRequest, noon } from "./helpers/fixtures";

function inStatus(status: RequestStatus) {
  return makeRequest({ status, statusHistory: [{ status, at: noon("2025-01-06"), source: "local" }] });
}

describe("RequestStateMachine", () => {
  it("accepts every legal pair with exactly one new history entry", () => {
    for (const from of REQUEST_STATUSES) {
      for (const to of TRANSITIONS[from]) {
        const request = inStatus(from);
        applyTransition(request, to, { at: noon("2025-01-07") });
        expect(request.status).toBe(to);
        expect(request.statusHistory).toHaveLength(2);
        expect(request.statusHistory[1]).toEqual({ status: to, at: noon("2025-01-07"), source: "local" });
      }
    }
  });

  it("rejects every pair outside the table and leaves the request unchanged", () => {
    for (const from of REQUEST_STATUSES) {
      for (const to of REQUEST_STATUSES) {
        if (canTransition(from, to)) continue;
        const request = inStatus(from);
        expect(() => applyTransition(request, to)).toThrow(InvalidTransition);
        expect(request.status).toBe(from);
        expect(request.statusHistory).toHaveLength(1);
      }
    }
  });

  it("reports the attempted transition on the error", () => {
    const request = inStatus("completed");
    try {
      applyTransition(request, "processing");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTransition);
      if (error instanceof InvalidTransition) {
        expect(error.message).toBe("Illegal status transition completed -> processing");
        expect(error.context).toMatchObject({ requestId: 1, from: "completed", to: "processing", jurisdiction: "NY" });
      }
    }
  });

  it("treats closed statuses as terminal but keeps partial open", () => {
    const closed: RequestStatus[] = ["completed", "no_records", "abandoned", "rejected"];
    expect(closed.every((status) => isTerminal(status))).toBe(true);
    expect(isTerminal("partial")).toBe(false);
    expect(isTerminal("appealing")).toBe(false);
  });

  it("refuses history that would go backwards", () => {
    const request = inStatus("submitted");
    expect(() => applyTransition(request, "acknowledged", { at: noon("2025-01-05") })).toThrow(HistoryOrderError);
  });

  it("clamps a lagging clock to the last history entry", () => {
    const request = inStatus("submitted");
    applyTransition(request, "acknowledged", { now: () => new Date(noon("2025-01-02")) });
    expect(request.statusHistory[1].at).toBe(noon("2025-01-06"));
  });

  it("records the source of each entry", () => {
    const request = inStatus("submitted");
    applyTransition(request, "processing", { at: noon("2025-01-08"), source: "platform" });
    expect(request.statusHistory[1].source).toBe("platform");
  });
});

describe("embargo", () => {
  it("blocks disclosure statuses until lifted", () => {
    const request = makeRequest({ status: "processing", embargo: true, statusHistory: [{ status: "processing", at: noon("2025-01-06"), source: "local" }] });
    expect(() => applyTransition(request, "completed")).toThrow(EmbargoActive);
    expect(() => applyTransition(request, "partial")).toThrow(EmbargoActive);

    liftEmbargo(request);
    applyTransition(request, "completed", { at: noon("2025-01-09") });
    expect(request.status).toBe("completed");
  });

  it("blocks exactly the disclosure statuses for every legal move", () => {
    for (const from of REQUEST_STATUSES) {
      for (const to of TRANSITIONS[from]) {
        const request = { ...inStatus(from), embargo: true };
        if (DISCLOSURE_STATUSES.includes(to)) {
          expect(() => applyTransition(request, to), `${from} -> ${to}`).toThrow(EmbargoActive);
        } else {
          expect(applyTransition(request, to, { at: noon("2025-01-09") }).status).toBe(to);
        }
      }
    }
    expect(DISCLOSURE_STATUSES).toEqual(["partial", "completed"]);
  });

  it("still allows an embargoed request to be rejected", () => {
    const request = makeRequest({ status: "processing", embargo: true, statusHistory: [{ status: "processing", at: noon("2025-01-06"), source: "local" }] });
    applyTransition(request, "rejected", { at: noon("2025-01-09") });
    expect(request.status).toBe("rejected");
  });
});

describe("findTransitionPath", () => {
  it("finds the shortest chain of legal moves", () => {
    expect(findTransitionPath("submitted", "completed")).toEqual(["acknowledged", "completed"]);
    expect(findTransitionPath("submitted", "payment_required")).toEqual(["acknowledged", "payment_required"]);
    expect(findTransitionPath("fix_required", "completed")).toEqual(["processing", "completed"]);
    expect(findTransitionPath("processing", "processing")).toEqual([]);
  });

  it("returns null when the target is unreachable", () => {
    expect(findTransitionPath("completed", "processing")).toBeNull();
    expect(findTransitionPath("no_records", "appealing")).toBeNull();
  });
});

describe("createSubmittedRequest", () => {
  it("starts with one submitted entry at the filing time", () => {
    const request = createSubmittedRequest({
      id: 7,
      title: "Fleet records",
      body: "Vehicle fleet inventory.",
      agencyId: 101,
      organizationId: 3,
      jurisdiction: "federal",
      filedAt: "2025-03-03T09:30:00-05:00",
    });
    expect(request.status).toBe("submitted");
    expect(request.filedAt).toBe("2025-03-03T14:30:00.000Z");
    expect(request.statusHistory).toEqual([{ status: "submitted", at: "2025-03-03T14:30:00.000Z", source: "local" }]);
    expect(request.embargo).toBe(false);
    expect(request.campaignId).toBeNull();
  });
});

describe("recordDenial", () => {
  it("keeps each denial event", () => {
    const request = inStatus("rejected");
    recordDenial(request, [{ exemptionCode: "b(5)", justification: "deliberative" }]);
    recordDenial(request, [{ exemptionCode: "b(6)", justification: "privacy" }], noon("2025-02-01"));
    expect(request.denials).toHaveLength(2);
    expect(request.denials[0].at).toBe(noon("2025-01-06"));
    expect(latestDenial(request)?.reasons).toEqual([{ exemptionCode: "b(6)", justification: "privacy" }]);
  });

  it("only applies to rejected or partial requests", () => {
    expect(() => recordDenial(inStatus("processing"), [{ exemptionCode: "b(5)", justification: "" }])).toThrow(InvalidInput);
  });
});
