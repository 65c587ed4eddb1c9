import { schemaTask } from "@trigger.dev/sdk";
import { defaultDeps } from "../lib/engine";
import { isRetryable } from "../lib/errors";
import { fileAppealPayloadSchema } from "../lib/schemas";
import { fileAppeal } from "../steps/file-appeal";
import { requestWrites } from "./queues";

export const fileAppealTask = schemaTask({
  id: "file-appeal",
  schema: fileAppealPayloadSchema,
  maxDuration: 300,
  queue: requestWrites,

  catchError: async ({ error }) => {
    if (!isRetryable(error)) return { skipRetrying: true };
  },

  run: async ({ requestId, submit }) => {
    const result = await fileAppeal(requestId, { submit }, defaultDeps());
    if (result.kind === "already_filed") {
      return { status: result.kind, denialEventAt: result.appeal.denialEventAt };
    }
    return {
      status: result.kind,
      unmatchedCount: result.appeal.unmatchedCount,
      letterSource: result.letter.source,
      subject: result.letter.subject,
      bodyText: result.letter.bodyText,
    };
  },
});
