/**
 * Request lifecycle state machine.
 *
 * The only code allowed to write FoiaRequest.status. Every change appends one
 * entry to statusHistory; history is never rewritten.
 */

import { EmbargoActive, HistoryOrderError, InvalidInput, InvalidTransition } from "./errors";
import type { DenialReason, FoiaRequest, HistorySource, RequestStatus } from "./types";

export const REQUEST_STATUSES: readonly RequestStatus[] = [
  "submitted",
  "acknowledged",
  "processing",
  "fix_required",
  "payment_required",
  "appealing",
  "partial",
  "rejected",
  "no_records",
  "completed",
  "abandoned",
];

export const TRANSITIONS: Record<RequestStatus, readonly RequestStatus[]> = {
  submitted: ["acknowledged", "processing", "fix_required", "rejected", "abandoned"],
  acknowledged: ["processing", "fix_required", "payment_required", "rejected", "partial", "completed", "no_records"],
  processing: ["fix_required", "payment_required", "partial", "completed", "rejected", "no_records"],
  fix_required: ["processing", "abandoned"],
  payment_required: ["processing", "abandoned"],
  partial: ["appealing", "completed"],
  rejected: ["appealing", "abandoned"],
  appealing: ["processing", "partial", "completed", "rejected"],
  no_records: [],
  completed: [],
  abandoned: [],
};

export const TERMINAL_STATUSES: readonly RequestStatus[] = ["completed", "no_records", "abandoned", "rejected"];

/** Statuses that pause the statutory clock: the agency is waiting on the requester. */
export const PAUSED_STATUSES: readonly RequestStatus[] = ["fix_required", "payment_required"];

/** Statuses that release records. An embargoed request cannot enter them until the embargo is lifted. */
export const DISCLOSURE_STATUSES: readonly RequestStatus[] = ["partial", "completed"];

export function isRequestStatus(value: string): value is RequestStatus {
  return (REQUEST_STATUSES as readonly string[]).includes(value);
}

export function isTerminal(status: RequestStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function requestContext(request: FoiaRequest): Record<string, unknown> {
  return { requestId: request.id, agencyId: request.agencyId, jurisdiction: request.jurisdiction };
}

export function assertTransition(request: FoiaRequest, to: RequestStatus): void {
  if (!canTransition(request.status, to)) {
    throw new InvalidTransition(request.status, to, requestContext(request));
  }
  // An embargoed request may still be rejected or abandoned
  if (request.embargo && DISCLOSURE_STATUSES.includes(to)) {
    throw new EmbargoActive(to, requestContext(request));
  }
}

export interface TransitionOptions {
  at?: string;
  source?: HistorySource;
  now?: () => Date;
}

/**
 * Moves the request to `to`, appending exactly one history entry. Throws
 * InvalidTransition for pairs outside the table and HistoryOrderError when an
 * explicit timestamp would go backwards.
 */
export function applyTransition(request: FoiaRequest, to: RequestStatus, options: TransitionOptions = {}): FoiaRequest {
  assertTransition(request, to);

  const last = request.statusHistory[request.statusHistory.length - 1];
  let at: string;
  if (options.at) {
    at = new Date(options.at).toISOString();
    if (last && at < last.at) throw new HistoryOrderError(at, last.at, requestContext(request));
  } else {
    // A clock behind the last entry is clamped so history stays ordered
    const now = (options.now ?? (() => new Date()))().toISOString();
    at = last && now < last.at ? last.at : now;
  }

  request.status = to;
  request.statusHistory.push({ status: to, at, source: options.source ?? "local" });
  return request;
}

/** Shortest chain of legal transitions from `from` to `to`, excluding `from`. Null when unreachable. */
export function findTransitionPath(from: RequestStatus, to: RequestStatus): RequestStatus[] | null {
  if (from === to) return [];
  const previous = new Map<RequestStatus, RequestStatus>();
  const queue: RequestStatus[] = [from];
  const seen = new Set<RequestStatus>([from]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of TRANSITIONS[current]) {
      if (seen.has(next)) continue;
      seen.add(next);
      previous.set(next, current);
      if (next === to) {
        const path: RequestStatus[] = [to];
        let step = current;
        while (step !== from) {
          path.unshift(step);
          const before = previous.get(step);
          if (before === undefined) break;
          step = before;
        }
        return path;
      }
      queue.push(next);
    }
  }
  return null;
}

export interface NewRequestInput {
  id: number | null;
  title: string;
  body: string;
  agencyId: number;
  organizationId: number | null;
  jurisdiction: string;
  filedAt: string;
  embargo?: boolean;
  campaignId?: string | null;
}

export function createSubmittedRequest(input: NewRequestInput): FoiaRequest {
  const filedAt = new Date(input.filedAt).toISOString();
  return {
    id: input.id,
    title: input.title,
    body: input.body,
    agencyId: input.agencyId,
    organizationId: input.organizationId,
    jurisdiction: input.jurisdiction,
    filedAt,
    status: "submitted",
    statusHistory: [{ status: "submitted", at: filedAt, source: "local" }],
    feeAmount: null,
    embargo: input.embargo ?? false,
    denials: [],
    campaignId: input.campaignId ?? null,
  };
}

export function liftEmbargo(request: FoiaRequest): FoiaRequest {
  request.embargo = false;
  return request;
}

/**
 * Attaches the agency's exemption claims to the denial the request is
 * currently in. Each denial event is kept; later denials never overwrite
 * earlier ones.
 */
export function recordDenial(request: FoiaRequest, reasons: DenialReason[], at?: string): FoiaRequest {
  if (request.status !== "rejected" && request.status !== "partial") {
    throw new InvalidInput(`Denial reasons can only be attached to a rejected or partial request, not ${request.status}`, {
      requestId: request.id,
      status: request.status,
    });
  }
  const last = request.statusHistory[request.statusHistory.length - 1];
  request.denials.push({
    at: at ? new Date(at).toISOString() : last.at,
    status: request.status,
    reasons: reasons.map((reason) => ({ ...reason })),
  });
  return request;
}

export function latestDenial(request: FoiaRequest) {
  return request.denials.length > 0 ? request.denials[request.denials.length - 1] : null;
}
