/**
 * Sync Request Status Step
 *
 * Pulls the platform's view of a request and replays it through the state
 * machine. Gaps between the local status and a platform status are bridged
 * along the shortest legal path; the bridging entries are marked "inferred".
 * A platform status no legal path reaches fails the sync and leaves the stored
 * request untouched.
 */

import { requireRequest } from "../lib/campaign-store";
import type { EngineDeps } from "../lib/engine";
import { InvalidTransition } from "../lib/errors";
import { applyTransition, findTransitionPath, recordDenial } from "../lib/request-state";
import type { FoiaRequest, PlatformStatusSnapshot, RequestStatus, StatusHistoryEntry } from "../lib/types";

export interface SyncResult {
  requestId: number;
  from: RequestStatus;
  to: RequestStatus;
  applied: StatusHistoryEntry[];
  denialRecorded: boolean;
  feeAmount: number | null;
}

interface PlatformChange {
  status: RequestStatus;
  at: string;
}

/** Platform history newer than the local history, ending with the current status. */
function pendingChanges(request: FoiaRequest, snapshot: PlatformStatusSnapshot): PlatformChange[] {
  const lastAt = request.statusHistory[request.statusHistory.length - 1]?.at ?? request.filedAt;
  const changes = snapshot.history
    .map((change) => ({ status: change.status, at: new Date(change.at).toISOString() }))
    .filter((change) => change.at > lastAt);

  const final = changes[changes.length - 1];
  if (!final || final.status !== snapshot.status) {
    changes.push({ status: snapshot.status, at: new Date(snapshot.observedAt).toISOString() });
  }
  return changes;
}

/** Applies platform changes to `request` in place and returns the appended history entries. */
export function applyPlatformSnapshot(request: FoiaRequest, snapshot: PlatformStatusSnapshot): StatusHistoryEntry[] {
  const startLength = request.statusHistory.length;

  for (const change of pendingChanges(request, snapshot)) {
    if (change.status === request.status) continue;
    const path = findTransitionPath(request.status, change.status);
    if (!path) {
      throw new InvalidTransition(request.status, change.status, {
        requestId: request.id,
        agencyId: request.agencyId,
        jurisdiction: request.jurisdiction,
        source: "platform",
      });
    }
    const last = request.statusHistory[request.statusHistory.length - 1];
    // Platform clocks can trail ours; history must stay ordered
    const at = last && change.at < last.at ? last.at : change.at;
    path.forEach((status, index) => {
      applyTransition(request, status, { at, source: index === path.length - 1 ? "platform" : "inferred" });
    });
  }

  return request.statusHistory.slice(startLength);
}

export async function syncRequestStatus(requestId: number, deps: EngineDeps): Promise<SyncResult> {
  const log = deps.logger.child({ requestId });

  return deps.lock.run(requestId, async () => {
    const request = await requireRequest(deps.store, requestId);
    const from = request.status;
    const snapshot = await deps.platform.fetchRequestStatus(requestId);

    const applied = applyPlatformSnapshot(request, snapshot);

    let denialRecorded = false;
    const deniedNow = applied.some((entry) => entry.status === "rejected" || entry.status === "partial");
    if (deniedNow && (request.status === "rejected" || request.status === "partial") && snapshot.denialReasons.length > 0) {
      recordDenial(request, snapshot.denialReasons);
      denialRecorded = true;
    }

    if (snapshot.feeAmount !== null) request.feeAmount = snapshot.feeAmount;

    if (applied.length > 0 || denialRecorded || snapshot.feeAmount !== null) {
      await deps.store.saveRequest(request);
    }
    if (applied.length > 0) {
      log.info("Request status synced", {
        from,
        to: request.status,
        applied: applied.map((entry) => `${entry.status}:${entry.source}`),
      });
    } else {
      log.debug("Request status unchanged", { status: request.status });
    }

    return { requestId, from, to: request.status, applied, denialRecorded, feeAmount: request.feeAmount };
  });
}
