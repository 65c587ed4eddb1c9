/**
 * Multi-agency campaign coordination.
 *
 * A campaign fans one inquiry out to many agencies under a single filer. The
 * orchestrator never talks to the platform: it produces a plan of entries
 * (one per agency, in input order, staggered) that the executor task submits
 * one at a time. Each entry carries its own state so a restarted executor
 * resumes without double-submitting.
 */

import { addMilliseconds, isAfter, parseISO } from "date-fns";
import { generateAppeal } from "./appeal-generator";
import { monitorCompliance, type MonitorOptions } from "./compliance-monitor";
import { InvalidInput, NotFound } from "./errors";
import { filerId, selectOrganization, type OrganizationSelection } from "./organization-selector";
import type { PrecedentCatalog } from "./precedent-catalog";
import { isTerminal } from "./request-state";
import type {
  Appeal,
  Campaign,
  CampaignRollup,
  ComplianceReport,
  DuplicateTarget,
  FoiaRequest,
  Organization,
  PlanEntry,
} from "./types";

export interface PlanCampaignInput {
  campaignId: string;
  title: string;
  body: string;
  targets: readonly number[];
  organizations: readonly Organization[];
  organizationHint?: string | null;
  /** Checked against `organizations` by the caller; wins over the hint. */
  organizationId?: number | null;
  staggerIntervalMs?: number;
  startAt: Date;
  embargo?: boolean;
}

export type PlanOutcome =
  | { kind: "planned"; campaign: Campaign; selection: OrganizationSelection; duplicates: DuplicateTarget[] }
  | { kind: "needs_organization"; selection: OrganizationSelection };

const BLOCKING_ENTRY_STATES: ReadonlySet<PlanEntry["state"]> = new Set(["pending", "submitting", "failed"]);

function validateStagger(staggerIntervalMs: number): void {
  if (!Number.isFinite(staggerIntervalMs) || staggerIntervalMs < 0) {
    throw new InvalidInput(`staggerIntervalMs must be a non-negative number, got ${staggerIntervalMs}`, {
      staggerIntervalMs,
    });
  }
}

function findDuplicates(
  campaign: Campaign,
  requests: readonly FoiaRequest[],
  targets: readonly number[]
): { accepted: number[]; duplicates: DuplicateTarget[] } {
  const requestById = new Map(requests.filter((r) => r.id !== null).map((r) => [r.id, r]));
  const seen = new Set<number>();
  const accepted: number[] = [];
  const duplicates: DuplicateTarget[] = [];

  targets.forEach((agencyId, inputIndex) => {
    if (!Number.isInteger(agencyId) || agencyId <= 0) {
      throw new InvalidInput(`Invalid agency id ${agencyId} at position ${inputIndex}`, { agencyId, inputIndex });
    }
    if (seen.has(agencyId)) {
      duplicates.push({ agencyId, reason: "repeated_target", inputIndex });
      return;
    }
    seen.add(agencyId);

    const member = campaign.members.find((m) => m.agencyId === agencyId);
    if (member) {
      const request = requestById.get(member.requestId);
      // An unknown member request is treated as still open
      const open = !request || !isTerminal(request.status);
      duplicates.push({ agencyId, reason: open ? "open_member" : "closed_member", inputIndex });
      return;
    }
    if (campaign.entries.some((entry) => entry.agencyId === agencyId && BLOCKING_ENTRY_STATES.has(entry.state))) {
      duplicates.push({ agencyId, reason: "pending_entry", inputIndex });
      return;
    }
    accepted.push(agencyId);
  });

  return { accepted, duplicates };
}

function appendEntries(campaign: Campaign, agencyIds: number[], startAt: Date, staggerIntervalMs: number): PlanEntry[] {
  const firstPosition = campaign.entries.length;
  const entries = agencyIds.map((agencyId, index): PlanEntry => {
    const position = firstPosition + index;
    return {
      key: `${campaign.id}:${position}:${agencyId}`,
      agencyId,
      position,
      dueAt: addMilliseconds(startAt, index * staggerIntervalMs).toISOString(),
      state: "pending",
      attempts: 0,
      requestId: null,
      lastError: null,
      submittedAt: null,
    };
  });
  campaign.entries.push(...entries);
  return entries;
}

/**
 * Selects the filer once, drops duplicate targets (reported, not thrown) and
 * schedules entry i at startAt + i * staggerIntervalMs.
 */
export function planCampaign(input: PlanCampaignInput): PlanOutcome {
  const staggerIntervalMs = input.staggerIntervalMs ?? 0;
  validateStagger(staggerIntervalMs);

  const selection = selectOrganization(input.organizations, input.organizationHint, input.organizationId);
  const organizationId = filerId(selection);
  if (organizationId === undefined) return { kind: "needs_organization", selection };

  const campaign: Campaign = {
    id: input.campaignId,
    title: input.title,
    body: input.body,
    organizationId,
    createdAt: input.startAt.toISOString(),
    startAt: input.startAt.toISOString(),
    staggerIntervalMs,
    embargo: input.embargo ?? false,
    entries: [],
    members: [],
    duplicates: [],
    cancelledAt: null,
  };

  const { accepted, duplicates } = findDuplicates(campaign, [], input.targets);
  appendEntries(campaign, accepted, input.startAt, staggerIntervalMs);
  campaign.duplicates.push(...duplicates);
  return { kind: "planned", campaign, selection, duplicates };
}

/** Adds agencies to an existing campaign under its original filer. */
export function extendCampaign(
  campaign: Campaign,
  requests: readonly FoiaRequest[],
  targets: readonly number[],
  startAt: Date
): { entries: PlanEntry[]; duplicates: DuplicateTarget[] } {
  if (campaign.cancelledAt) {
    throw new InvalidInput(`Campaign ${campaign.id} was cancelled`, { campaignId: campaign.id });
  }
  const { accepted, duplicates } = findDuplicates(campaign, requests, targets);
  const entries = appendEntries(campaign, accepted, startAt, campaign.staggerIntervalMs);
  campaign.duplicates.push(...duplicates);
  return { entries, duplicates };
}

function requireEntry(campaign: Campaign, key: string): PlanEntry {
  const entry = campaign.entries.find((e) => e.key === key);
  if (!entry) throw new NotFound("Plan entry", key);
  return entry;
}

/**
 * The next entry to submit: an entry left in `submitting` by an interrupted
 * run first (it is resubmitted under the same idempotency key), then the first
 * pending entry whose time has come. Null once the campaign is cancelled.
 */
export function nextReadyEntry(campaign: Campaign, now: Date): PlanEntry | null {
  const ordered = [...campaign.entries].sort((a, b) => a.position - b.position);
  const interrupted = ordered.find((entry) => entry.state === "submitting");
  if (interrupted) return interrupted;
  if (campaign.cancelledAt) return null;
  return ordered.find((entry) => entry.state === "pending" && !isAfter(parseISO(entry.dueAt), now)) ?? null;
}

export function nextDueAt(campaign: Campaign): Date | null {
  if (campaign.cancelledAt) return null;
  const pending = campaign.entries
    .filter((entry) => entry.state === "pending")
    .map((entry) => parseISO(entry.dueAt))
    .sort((a, b) => a.getTime() - b.getTime());
  return pending[0] ?? null;
}

export function hasOutstandingEntries(campaign: Campaign): boolean {
  return campaign.entries.some((entry) => entry.state === "submitting" || (entry.state === "pending" && !campaign.cancelledAt));
}

export function markEntrySubmitting(campaign: Campaign, key: string): PlanEntry {
  const entry = requireEntry(campaign, key);
  if (entry.state !== "pending" && entry.state !== "submitting") {
    throw new InvalidInput(`Plan entry ${key} is ${entry.state} and cannot be submitted`, { key, state: entry.state });
  }
  entry.state = "submitting";
  entry.attempts += 1;
  return entry;
}

/** Records the platform's request for an entry. Members stay in plan order, not completion order. */
export function recordSubmission(campaign: Campaign, key: string, request: FoiaRequest, now: Date): PlanEntry {
  const entry = requireEntry(campaign, key);
  if (request.id === null) {
    throw new InvalidInput(`Submitted request for entry ${key} has no platform id`, { key });
  }
  if (entry.state === "submitted" && entry.requestId === request.id) return entry;

  entry.state = "submitted";
  entry.requestId = request.id;
  entry.submittedAt = now.toISOString();
  entry.lastError = null;

  if (!campaign.members.some((member) => member.requestId === request.id)) {
    campaign.members.push({ requestId: request.id, agencyId: entry.agencyId, position: entry.position });
    campaign.members.sort((a, b) => a.position - b.position);
  }
  return entry;
}

export interface FailureOptions {
  transient: boolean;
  now: Date;
  maxAttempts: number;
  backoffMs?: number;
}

/**
 * Transient failures go back to pending with exponential backoff until
 * maxAttempts is reached; permanent rejections are final. Other entries are
 * unaffected either way.
 */
export function recordEntryFailure(campaign: Campaign, key: string, message: string, options: FailureOptions): PlanEntry {
  const entry = requireEntry(campaign, key);
  entry.lastError = message;

  if (!options.transient) {
    entry.state = "rejected";
    return entry;
  }
  if (entry.attempts >= options.maxAttempts) {
    entry.state = "failed";
    return entry;
  }
  const backoffMs = (options.backoffMs ?? 60_000) * 2 ** Math.max(0, entry.attempts - 1);
  entry.state = campaign.cancelledAt ? "cancelled" : "pending";
  entry.dueAt = addMilliseconds(options.now, backoffMs).toISOString();
  return entry;
}

/** Re-queues a failed entry for another round of attempts. */
export function retryEntry(campaign: Campaign, key: string, now: Date): PlanEntry {
  const entry = requireEntry(campaign, key);
  if (entry.state !== "failed") {
    throw new InvalidInput(`Only failed entries can be retried; ${key} is ${entry.state}`, { key, state: entry.state });
  }
  entry.state = "pending";
  entry.attempts = 0;
  entry.dueAt = now.toISOString();
  return entry;
}

/** Stops pending entries. Entries already submitted (or mid-submission) are left as they are. */
export function cancelCampaign(campaign: Campaign, now: Date): PlanEntry[] {
  const cancelled = campaign.entries.filter((entry) => entry.state === "pending");
  for (const entry of cancelled) entry.state = "cancelled";
  campaign.cancelledAt = campaign.cancelledAt ?? now.toISOString();
  return cancelled;
}

export function campaignRollup(campaign: Campaign, reports: readonly ComplianceReport[]): CampaignRollup {
  if (reports.some((report) => report.deadline.verdict === "overdue")) return "attention_needed";
  if (reports.some((report) => !isTerminal(report.status))) return "in_progress";
  if (hasOutstandingEntries(campaign)) return "in_progress";
  return "complete";
}

export interface CampaignSummary {
  campaignId: string;
  rollup: CampaignRollup;
  compliance: ComplianceReport[];
  appeals: Appeal[];
  pendingEntries: number;
  failedEntries: number;
  duplicates: DuplicateTarget[];
}

export interface SummaryOptions extends Omit<MonitorOptions, "filter"> {
  catalog?: PrecedentCatalog;
  agencyNames?: ReadonlyMap<number, string>;
}

/** Read-only roll-up of every member's compliance plus appeal drafts for denied members. */
export function summarizeCampaign(
  campaign: Campaign,
  requests: readonly FoiaRequest[],
  options: SummaryOptions = {}
): CampaignSummary {
  const requestById = new Map(requests.filter((r) => r.id !== null).map((r) => [r.id, r]));
  const memberRequests = campaign.members
    .map((member) => requestById.get(member.requestId))
    .filter((request): request is FoiaRequest => request !== undefined);

  const compliance = monitorCompliance(memberRequests, options);
  const appeals = memberRequests
    .filter((request) => (request.status === "rejected" || request.status === "partial") && request.denials.length > 0)
    .map((request) =>
      generateAppeal(request, {
        catalog: options.catalog,
        agencyName: options.agencyNames?.get(request.agencyId),
        now: options.now,
      })
    );

  return {
    campaignId: campaign.id,
    rollup: campaignRollup(campaign, compliance),
    compliance,
    appeals,
    pendingEntries: campaign.entries.filter((entry) => entry.state === "pending" || entry.state === "submitting").length,
    failedEntries: campaign.entries.filter((entry) => entry.state === "failed").length,
    duplicates: campaign.duplicates,
  };
}
