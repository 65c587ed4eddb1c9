import type { EngineDeps } from "../../trigger/lib/engine";
import { loadConfig } from "../../trigger/lib/config";
import { jurisdictionRules } from "../../trigger/lib/jurisdiction-rules";
import { createLogger } from "../../trigger/lib/logger";
import { precedentCatalog } from "../../trigger/lib/precedent-catalog";
import { RequestLock } from "../../trigger/lib/request-lock";
import type { Agency, FoiaRequest, StatusHistoryEntry } from "../../trigger/lib/types";
import { FakePlatform } from "./fake-platform";
import { InMemoryCampaignStore } from "./memory-store";

/** Noon UTC on the given day, so day arithmetic never straddles midnight. */
export function noon(day: string): string {
  return `${day}T12:00:00.000Z`;
}

export function history(...entries: Array<[StatusHistoryEntry["status"], string]>): StatusHistoryEntry[] {
  return entries.map(([status, day]) => ({ status, at: noon(day), source: "local" }));
}

export function makeRequest(overrides: Partial<FoiaRequest> = {}): FoiaRequest {
  const filedAt = overrides.filedAt ?? noon("2025-01-06");
  return {
    id: 1,
    title: "Use of force reports",
    body: "All use of force reports filed during 2024.",
    agencyId: 101,
    organizationId: null,
    jurisdiction: "NY",
    filedAt,
    status: "submitted",
    statusHistory: [{ status: "submitted", at: filedAt, source: "local" }],
    feeAmount: null,
    embargo: false,
    denials: [],
    campaignId: null,
    ...overrides,
  };
}

export function makeAgency(id: number, name: string, jurisdiction = "federal"): Agency {
  return { id, name, jurisdiction, averageResponseDays: null, feeRate: null, successRate: null, feeSchedule: null };
}

export interface TestDeps extends EngineDeps {
  store: InMemoryCampaignStore;
  platform: FakePlatform;
  clock: { now: Date };
}

export function makeDeps(env: Record<string, string> = {}, start = noon("2025-03-03")): TestDeps {
  const clock = { now: new Date(start) };
  return {
    store: new InMemoryCampaignStore(),
    platform: new FakePlatform(),
    lock: new RequestLock(),
    config: loadConfig(env),
    rules: jurisdictionRules,
    catalog: precedentCatalog,
    logger: createLogger("test"),
    now: () => new Date(clock.now),
    clock,
  };
}
