/**
 * Manage Request Steps
 *
 * Requester actions on filed requests: listing and searching them, sending a
 * follow-up by hand and lifting an embargo. Writes run under the per-request
 * lock, like status syncs and appeals.
 */

import { requireRequest } from "../lib/campaign-store";
import { buildFollowupMessage, monitorCompliance } from "../lib/compliance-monitor";
import type { EngineDeps } from "../lib/engine";
import { InvalidInput } from "../lib/errors";
import { isTerminal, liftEmbargo } from "../lib/request-state";
import type { ListRequestsPayload, PostFollowupPayload, SearchRequestsPayload } from "../lib/schemas";
import type { ComplianceReport, FoiaRequest, PlatformRequestSummary } from "../lib/types";

export interface RequestListing {
  request: FoiaRequest;
  compliance: ComplianceReport;
}

export async function listMyRequests(query: ListRequestsPayload, deps: EngineDeps): Promise<RequestListing[]> {
  const requests = await deps.store.listRequests(query);
  const reports = monitorCompliance(requests, {
    now: deps.now(),
    warningDays: deps.config.DUE_SOON_WARNING_DAYS,
    rules: deps.rules,
  });
  return requests.map((request, index) => ({ request, compliance: reports[index] }));
}

export interface RequestSearchHit extends PlatformRequestSummary {
  /** True when the engine already stores this request. */
  tracked: boolean;
}

/** Searches every request on the platform, not only the engine's own. */
export async function searchPlatformRequests(input: SearchRequestsPayload, deps: EngineDeps): Promise<RequestSearchHit[]> {
  const hits = await deps.platform.searchRequests(input.query, input.limit);
  return Promise.all(
    hits.map(async (hit) => ({ ...hit, tracked: (await deps.store.getRequest(hit.id)) !== null }))
  );
}

export interface FollowupResult {
  requestId: number;
  message: string;
  compliance: ComplianceReport;
}

export async function sendFollowup(input: PostFollowupPayload, deps: EngineDeps): Promise<FollowupResult> {
  const { requestId } = input;

  return deps.lock.run(requestId, async () => {
    const request = await requireRequest(deps.store, requestId);
    if (isTerminal(request.status)) {
      throw new InvalidInput(`Request ${requestId} is ${request.status}; there is nothing to follow up on`, {
        requestId,
        status: request.status,
      });
    }

    const [compliance] = monitorCompliance([request], {
      now: deps.now(),
      warningDays: deps.config.DUE_SOON_WARNING_DAYS,
      rules: deps.rules,
    });
    const message = input.message ?? buildFollowupMessage(request, compliance, deps.rules);
    await deps.platform.postFollowup(requestId, message);
    deps.logger.info("Follow-up posted", { requestId, verdict: compliance.deadline.verdict, custom: input.message !== undefined });
    return { requestId, message, compliance };
  });
}

/** Clears the embargo so the request can move into disclosure statuses. Lifting twice is a no-op. */
export async function liftRequestEmbargo(requestId: number, deps: EngineDeps): Promise<FoiaRequest> {
  return deps.lock.run(requestId, async () => {
    const request = await requireRequest(deps.store, requestId);
    if (!request.embargo) return request;

    liftEmbargo(request);
    await deps.store.saveRequest(request);
    deps.logger.info("Embargo lifted", { requestId, status: request.status });
    return request;
  });
}
