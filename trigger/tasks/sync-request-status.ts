import { schemaTask } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { isRetryable } from "../lib/errors";
import { syncRequestPayloadSchema } from "../lib/schemas";
import { syncRequestStatus } from "../steps/sync-request-status";
import { requestWrites } from "./queues";

// Trigger with requestConcurrencyKey(requestId): one writer per request across workers.
export const syncRequestStatusTask = schemaTask({
  id: "sync-request-status",
  schema: syncRequestPayloadSchema,
  maxDuration: 120,
  queue: requestWrites,

  catchError: async ({ error }) => {
    if (!isRetryable(error)) return { skipRetrying: true };
  },

  run: async ({ requestId }) => syncRequestStatus(requestId, defaultDeps()),
});
