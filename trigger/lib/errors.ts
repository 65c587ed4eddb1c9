import type { RequestStatus } from "./types";

export type ErrorContext = Record<string, unknown>;

export class CampaignEngineError extends Error {
  readonly code: string;
  readonly context: ErrorContext;
  readonly retryable: boolean;

  constructor(code: string, message: string, context: ErrorContext = {}, retryable = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.retryable = retryable;
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message, context: this.context };
  }
}

export class InvalidTransition extends CampaignEngineError {
  readonly from: RequestStatus;
  readonly to: RequestStatus;

  constructor(from: RequestStatus, to: RequestStatus, context: ErrorContext = {}) {
    super("INVALID_TRANSITION", `Illegal status transition ${from} -> ${to}`, { ...context, from, to });
    this.from = from;
    this.to = to;
  }
}

export class HistoryOrderError extends CampaignEngineError {
  constructor(at: string, lastAt: string, context: ErrorContext = {}) {
    super("HISTORY_ORDER", `Transition at ${at} precedes last history entry at ${lastAt}`, {
      ...context,
      at,
      lastAt,
    });
  }
}

export class EmbargoActive extends CampaignEngineError {
  constructor(to: RequestStatus, context: ErrorContext = {}) {
    super("EMBARGO_ACTIVE", `Request is embargoed; cannot move to ${to} before the embargo is lifted`, {
      ...context,
      to,
    });
  }
}

export class UnknownStatus extends CampaignEngineError {
  constructor(raw: string, context: ErrorContext = {}) {
    super("UNKNOWN_STATUS", `Unknown platform status "${raw}"`, { ...context, raw });
  }
}

export class UnknownJurisdiction extends CampaignEngineError {
  constructor(jurisdiction: string, context: ErrorContext = {}) {
    super("UNKNOWN_JURISDICTION", `No statutory rules for jurisdiction "${jurisdiction}"`, {
      ...context,
      jurisdiction,
    });
  }
}

export class InvalidInput extends CampaignEngineError {
  constructor(message: string, context: ErrorContext = {}) {
    super("INVALID_INPUT", message, context);
  }
}

export class ConcurrentTransition extends CampaignEngineError {
  constructor(requestKey: string) {
    super("CONCURRENT_TRANSITION", `Another status change is in flight for request ${requestKey}`, {
      requestKey,
    });
  }
}

export class NotFound extends CampaignEngineError {
  constructor(entity: string, id: string | number) {
    super("NOT_FOUND", `${entity} ${id} not found`, { entity, id });
  }
}

export class TransientNetworkError extends CampaignEngineError {
  readonly status: number | null;

  constructor(message: string, status: number | null, context: ErrorContext = {}) {
    super("TRANSIENT_NETWORK", message, { ...context, status }, true);
    this.status = status;
  }
}

export class SubmissionRejected extends CampaignEngineError {
  readonly platformMessage: string;

  constructor(platformMessage: string, context: ErrorContext = {}) {
    super("SUBMISSION_REJECTED", platformMessage, context);
    this.platformMessage = platformMessage;
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof CampaignEngineError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
