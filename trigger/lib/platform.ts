/**
 * Contract for the remote records platform. The engine only needs these
 * operations; network I/O, auth and retries live in the implementation.
 */

import { UnknownStatus } from "./errors";
import { isRequestStatus } from "./request-state";
import type {
  Agency,
  FoiaRequest,
  Organization,
  PlatformRequestSummary,
  PlatformStatusSnapshot,
  RequestStatus,
  SubmitRequestInput,
} from "./types";

export interface FoiaPlatform {
  lookupAgency(id: number): Promise<Agency | null>;
  searchAgencies(query: string, limit?: number): Promise<Agency[]>;
  searchRequests(query: string, limit?: number): Promise<PlatformRequestSummary[]>;
  listUserOrganizations(): Promise<Organization[]>;
  /**
   * Throws SubmissionRejected for platform-side validation failures and
   * TransientNetworkError for timeouts/5xx. Retrying with the same
   * idempotency key must not create a second request.
   */
  submitRequest(input: SubmitRequestInput, idempotencyKey: string): Promise<FoiaRequest>;
  fetchRequestStatus(id: number): Promise<PlatformStatusSnapshot>;
  postFollowup(id: number, message: string): Promise<void>;
  /** Reposting under the same idempotency key must not file a second appeal. */
  postAppeal(id: number, appealText: string, idempotencyKey: string): Promise<void>;
}

const PLATFORM_STATUS_ALIASES = new Map<string, RequestStatus>([
  ["done", "completed"],
  ["ack", "acknowledged"],
  ["processed", "processing"],
  ["fix", "fix_required"],
  ["payment", "payment_required"],
  ["no_docs", "no_records"],
]);

/** Fails closed: an unrecognized platform status never widens the state machine. */
export function mapPlatformStatus(raw: string, context: Record<string, unknown> = {}): RequestStatus {
  const key = raw.trim().toLowerCase();
  const mapped = PLATFORM_STATUS_ALIASES.get(key);
  if (mapped) return mapped;
  if (isRequestStatus(key)) return key;
  throw new UnknownStatus(raw, context);
}
