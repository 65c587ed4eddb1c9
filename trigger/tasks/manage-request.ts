import { schemaTask } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { isRetryable } from "../lib/errors";
import {
  findAgenciesPayloadSchema,
  liftEmbargoPayloadSchema,
  listRequestsPayloadSchema,
  postFollowupPayloadSchema,
  searchRequestsPayloadSchema,
} from "../lib/schemas";
import { findAgencies } from "../steps/find-agencies";
import { liftRequestEmbargo, listMyRequests, searchPlatformRequests, sendFollowup } from "../steps/manage-request";
import { requestWrites } from "./queues";

export const listRequestsTask = schemaTask({
  id: "list-requests",
  schema: listRequestsPayloadSchema,
  maxDuration: 60,

  run: async (payload) => {
    const listings = await listMyRequests(payload, defaultDeps());
    return listings.map(({ request, compliance }) => ({
      requestId: request.id,
      title: request.title,
      agencyId: request.agencyId,
      campaignId: request.campaignId,
      status: request.status,
      embargo: request.embargo,
      dueDate: compliance.deadline.dueDate,
      verdict: compliance.deadline.verdict,
      action: compliance.action,
    }));
  },
});

export const searchRequestsTask = schemaTask({
  id: "search-requests",
  schema: searchRequestsPayloadSchema,
  maxDuration: 60,

  run: async (payload) => searchPlatformRequests(payload, defaultDeps()),
});

export const findAgenciesTask = schemaTask({
  id: "find-agencies",
  schema: findAgenciesPayloadSchema,
  maxDuration: 60,

  run: async (payload) => findAgencies(payload, defaultDeps()),
});

// Both write the request: trigger with requestConcurrencyKey(requestId).
export const postFollowupTask = schemaTask({
  id: "post-followup",
  schema: postFollowupPayloadSchema,
  maxDuration: 120,
  queue: requestWrites,

  catchError: async ({ error }) => {
    if (!isRetryable(error)) return { skipRetrying: true };
  },

  run: async (payload) => {
    const result = await sendFollowup(payload, defaultDeps());
    return { requestId: result.requestId, message: result.message, verdict: result.compliance.deadline.verdict };
  },
});

export const liftEmbargoTask = schemaTask({
  id: "lift-embargo",
  schema: liftEmbargoPayloadSchema,
  maxDuration: 60,
  queue: requestWrites,

  catchError: async ({ error }) => {
    if (!isRetryable(error)) return { skipRetrying: true };
  },

  run: async ({ requestId }) => {
    const request = await liftRequestEmbargo(requestId, defaultDeps());
    return { requestId, status: request.status, embargo: request.embargo };
  },
});
