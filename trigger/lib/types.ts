export type RequestStatus =
  | "submitted"
  | "acknowledged"
  | "processing"
  | "fix_required"
  | "payment_required"
  | "appealing"
  | "partial"
  | "rejected"
  | "no_records"
  | "completed"
  | "abandoned";

export type ComplianceVerdict = "on_track" | "due_soon" | "overdue" | "not_applicable";

export type RecommendedAction = "send_followup" | "file_appeal" | "proactive_followup" | "none";

export type RequesterCategory = "individual" | "news_media" | "educational" | "commercial";

export type HistorySource = "local" | "platform" | "inferred";

export type CampaignRollup = "attention_needed" | "in_progress" | "complete";

export type PlanEntryState = "pending" | "submitting" | "submitted" | "failed" | "rejected" | "cancelled";

export type DuplicateReason = "repeated_target" | "open_member" | "closed_member" | "pending_entry";

export interface FeeSchedule {
  freePageAllowance: number;
  perPageRate: number;
}

export interface Agency {
  id: number;
  name: string;
  jurisdiction: string;
  averageResponseDays: number | null;
  feeRate: number | null;
  successRate: number | null;
  feeSchedule?: FeeSchedule | null;
}

export interface Organization {
  id: number;
  name: string;
  ownerUserId: number | null;
}

export interface StatusHistoryEntry {
  status: RequestStatus;
  at: string;
  source: HistorySource;
}

export interface DenialReason {
  exemptionCode: string;
  justification: string;
}

export interface DenialEvent {
  at: string;
  status: "rejected" | "partial";
  reasons: DenialReason[];
}

export interface FoiaRequest {
  id: number | null;
  title: string;
  body: string;
  agencyId: number;
  organizationId: number | null;
  jurisdiction: string;
  filedAt: string;
  status: RequestStatus;
  statusHistory: StatusHistoryEntry[];
  feeAmount: number | null;
  embargo: boolean;
  denials: DenialEvent[];
  campaignId: string | null;
}

export interface Precedent {
  citation: string;
  holding: string;
  argument: string;
}

export interface AppealEntry {
  reason: DenialReason;
  /** Catalog key the precedents came from; differs from the reason's code on a family fallback. */
  matchedCode: string | null;
  precedents: Precedent[];
  argument: string | null;
  unmatched: boolean;
}

export interface Appeal {
  requestId: number | null;
  denialEventAt: string;
  entries: AppealEntry[];
  unmatchedCount: number;
  generatedAt: string;
}

export interface PlanEntry {
  /** Idempotency key handed to the platform on every submission attempt. */
  key: string;
  agencyId: number;
  position: number;
  dueAt: string;
  state: PlanEntryState;
  attempts: number;
  requestId: number | null;
  lastError: string | null;
  submittedAt: string | null;
}

export interface DuplicateTarget {
  agencyId: number;
  reason: DuplicateReason;
  inputIndex: number;
}

export interface CampaignMember {
  requestId: number;
  agencyId: number;
  position: number;
}

export interface Campaign {
  id: string;
  title: string;
  body: string;
  organizationId: number | null;
  createdAt: string;
  startAt: string;
  staggerIntervalMs: number;
  embargo: boolean;
  entries: PlanEntry[];
  members: CampaignMember[];
  duplicates: DuplicateTarget[];
  cancelledAt: string | null;
}

export interface DeadlineResult {
  jurisdiction: string;
  dueDate: string;
  verdict: ComplianceVerdict;
  pausedBusinessDays: number;
  businessDaysRemaining: number;
}

export interface ComplianceReport {
  requestId: number | null;
  agencyId: number;
  status: RequestStatus;
  deadline: DeadlineResult;
  action: RecommendedAction;
}

export interface PlatformStatusSnapshot {
  status: RequestStatus;
  observedAt: string;
  history: Array<{ status: RequestStatus; at: string }>;
  feeAmount: number | null;
  denialReasons: DenialReason[];
}

/** A request as the platform's public search returns it. */
export interface PlatformRequestSummary {
  id: number;
  title: string;
  status: RequestStatus;
  agencyId: number;
  submittedAt: string | null;
}

export interface SubmitRequestInput {
  title: string;
  body: string;
  agencyId: number;
  organizationId: number | null;
  embargo: boolean;
  requestFeeWaiver?: boolean;
}
