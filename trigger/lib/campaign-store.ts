/**
 * Persistence for campaigns, their plan entries, member requests and appeals.
 *
 * Steps depend on the CampaignStore interface only; PgCampaignStore is the
 * production implementation. Campaign saves only insert entries; an existing
 * entry changes through updateEntry, which compares its stored state first,
 * so a stale campaign copy never rewinds an entry or clears a cancellation.
 */

import type { PoolClient } from "pg";
import { z } from "zod";
import db, { type Db } from "./db";
import { NotFound } from "./errors";
import { requestStatusSchema as statusSchema } from "./schemas";
import type {
  Appeal,
  AppealEntry,
  Campaign,
  DenialEvent,
  DuplicateTarget,
  FoiaRequest,
  PlanEntry,
  PlanEntryState,
  RequestStatus,
  StatusHistoryEntry,
} from "./types";

export interface StoredAppeal extends Appeal {
  letterSubject: string | null;
  letterBody: string | null;
  postedAt: string | null;
}

export interface RequestQuery {
  campaignId?: string;
  agencyId?: number;
  statuses?: readonly RequestStatus[];
  /** Case-insensitive substring of the title or body. */
  search?: string;
}

export interface CampaignStore {
  getCampaign(id: string): Promise<Campaign | null>;
  /**
   * Upserts the campaign row and inserts entries not stored yet. Stored entries
   * are left alone, cancelledAt is never cleared once set, and entries added to
   * a cancelled campaign are stored as cancelled.
   */
  saveCampaign(campaign: Campaign): Promise<void>;
  /**
   * Writes one stored entry when its current state is one of `from`. A pending
   * entry of a cancelled campaign is written as cancelled. Returns the entry as
   * stored, or null when its state had already moved on.
   */
  updateEntry(campaignId: string, entry: PlanEntry, from: readonly PlanEntryState[]): Promise<PlanEntry | null>;
  listActiveCampaigns(): Promise<Campaign[]>;
  getRequest(id: number): Promise<FoiaRequest | null>;
  saveRequest(request: FoiaRequest): Promise<void>;
  listRequests(query?: RequestQuery): Promise<FoiaRequest[]>;
  /** Append-only: a second appeal for the same denial event is ignored and false is returned. */
  insertAppeal(appeal: StoredAppeal): Promise<boolean>;
  listAppeals(requestId: number): Promise<StoredAppeal[]>;
}

export async function requireCampaign(store: CampaignStore, id: string): Promise<Campaign> {
  const campaign = await store.getCampaign(id);
  if (!campaign) throw new NotFound("Campaign", id);
  return campaign;
}

export async function requireRequest(store: CampaignStore, id: number): Promise<FoiaRequest> {
  const request = await store.getRequest(id);
  if (!request) throw new NotFound("Request", id);
  return request;
}

// Row shapes. pg returns TIMESTAMPTZ as Date, NUMERIC as string and JSONB parsed.

const isoDate = z.union([z.date(), z.string()]).transform((value) => new Date(value).toISOString());


const historySchema = z.array(
  z.object({ status: statusSchema, at: z.string(), source: z.enum(["local", "platform", "inferred"]) })
);

const denialsSchema = z.array(
  z.object({
    at: z.string(),
    status: z.enum(["rejected", "partial"]),
    reasons: z.array(z.object({ exemptionCode: z.string(), justification: z.string() })),
  })
);

const duplicatesSchema = z.array(
  z.object({
    agencyId: z.number(),
    reason: z.enum(["repeated_target", "open_member", "closed_member", "pending_entry"]),
    inputIndex: z.number(),
  })
);

const appealEntriesSchema = z.array(
  z.object({
    reason: z.object({ exemptionCode: z.string(), justification: z.string() }),
    matchedCode: z.string().nullable(),
    precedents: z.array(z.object({ citation: z.string(), holding: z.string(), argument: z.string() })),
    argument: z.string().nullable(),
    unmatched: z.boolean(),
  })
);

const campaignRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  body: z.string(),
  organization_id: z.number().nullable(),
  created_at: isoDate,
  start_at: isoDate,
  stagger_interval_ms: z.coerce.number(),
  embargo: z.boolean(),
  duplicates: duplicatesSchema,
  cancelled_at: isoDate.nullable(),
});

const entryRowSchema = z.object({
  key: z.string(),
  agency_id: z.number(),
  position: z.number(),
  due_at: isoDate,
  state: z.enum(["pending", "submitting", "submitted", "failed", "rejected", "cancelled"]),
  attempts: z.number(),
  request_id: z.number().nullable(),
  last_error: z.string().nullable(),
  submitted_at: isoDate.nullable(),
});

const requestRowSchema = z.object({
  id: z.number(),
  campaign_id: z.string().nullable(),
  title: z.string(),
  body: z.string(),
  agency_id: z.number(),
  organization_id: z.number().nullable(),
  jurisdiction: z.string(),
  filed_at: isoDate,
  status: statusSchema,
  status_history: historySchema,
  fee_amount: z.coerce.number().nullable(),
  embargo: z.boolean(),
  denials: denialsSchema,
});

const appealRowSchema = z.object({
  request_id: z.number(),
  denial_event_at: isoDate,
  entries: appealEntriesSchema,
  unmatched_count: z.number(),
  generated_at: isoDate,
  letter_subject: z.string().nullable(),
  letter_body: z.string().nullable(),
  posted_at: isoDate.nullable(),
});

function toEntry(row: z.infer<typeof entryRowSchema>): PlanEntry {
  return {
    key: row.key,
    agencyId: row.agency_id,
    position: row.position,
    dueAt: row.due_at,
    state: row.state,
    attempts: row.attempts,
    requestId: row.request_id,
    lastError: row.last_error,
    submittedAt: row.submitted_at,
  };
}

function toRequest(row: z.infer<typeof requestRowSchema>): FoiaRequest {
  const statusHistory: StatusHistoryEntry[] = row.status_history;
  const denials: DenialEvent[] = row.denials;
  return {
    id: row.id,
    title: row.title,
    body: row.body,
    agencyId: row.agency_id,
    organizationId: row.organization_id,
    jurisdiction: row.jurisdiction,
    filedAt: row.filed_at,
    status: row.status,
    statusHistory,
    feeAmount: row.fee_amount,
    embargo: row.embargo,
    denials,
    campaignId: row.campaign_id,
  };
}

function toAppeal(row: z.infer<typeof appealRowSchema>): StoredAppeal {
  const entries: AppealEntry[] = row.entries;
  return {
    requestId: row.request_id,
    denialEventAt: row.denial_event_at,
    entries,
    unmatchedCount: row.unmatched_count,
    generatedAt: row.generated_at,
    letterSubject: row.letter_subject,
    letterBody: row.letter_body,
    postedAt: row.posted_at,
  };
}

export class PgCampaignStore implements CampaignStore {
  constructor(private readonly database: Db = db) {}

  private async ready(): Promise<void> {
    await this.database.ensureSchema();
  }

  async getCampaign(id: string): Promise<Campaign | null> {
    await this.ready();
    const campaignResult = await this.database.query("SELECT * FROM campaigns WHERE id = $1", [id]);
    if (campaignResult.rows.length === 0) return null;
    const row = campaignRowSchema.parse(campaignResult.rows[0]);

    const entryResult = await this.database.query(
      "SELECT * FROM campaign_plan_entries WHERE campaign_id = $1 ORDER BY position",
      [id]
    );
    const entries = entryResult.rows.map((entry) => toEntry(entryRowSchema.parse(entry)));
    const duplicates: DuplicateTarget[] = row.duplicates;

    return {
      id: row.id,
      title: row.title,
      body: row.body,
      organizationId: row.organization_id,
      createdAt: row.created_at,
      startAt: row.start_at,
      staggerIntervalMs: row.stagger_interval_ms,
      embargo: row.embargo,
      entries,
      // Members are derived from submitted entries, which already carry position order
      members: entries.flatMap((entry) =>
        entry.state === "submitted" && entry.requestId !== null
          ? [{ requestId: entry.requestId, agencyId: entry.agencyId, position: entry.position }]
          : []
      ),
      duplicates,
      cancelledAt: row.cancelled_at,
    };
  }

  async saveCampaign(campaign: Campaign): Promise<void> {
    await this.ready();
    await this.database.withTransaction(async (client: PoolClient) => {
      await client.query(
        `INSERT INTO campaigns (id, title, body, organization_id, created_at, start_at, stagger_interval_ms, embargo, duplicates, cancelled_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (id) DO UPDATE SET
           title = EXCLUDED.title,
           body = EXCLUDED.body,
           duplicates = EXCLUDED.duplicates,
           cancelled_at = COALESCE(campaigns.cancelled_at, EXCLUDED.cancelled_at)`,
        [
          campaign.id,
          campaign.title,
          campaign.body,
          campaign.organizationId,
          campaign.createdAt,
          campaign.startAt,
          campaign.staggerIntervalMs,
          campaign.embargo,
          JSON.stringify(campaign.duplicates),
          campaign.cancelledAt,
        ]
      );
      for (const entry of campaign.entries) {
        await client.query(
          `INSERT INTO campaign_plan_entries (key, campaign_id, agency_id, position, due_at, state, attempts, request_id, last_error, submitted_at)
           SELECT $1::text, c.id, $3::integer, $4::integer, $5::timestamptz,
                  CASE WHEN c.cancelled_at IS NOT NULL AND $6::text = 'pending' THEN 'cancelled' ELSE $6::text END,
                  $7::integer, $8::integer, $9::text, $10::timestamptz
           FROM campaigns c WHERE c.id = $2
           ON CONFLICT (key) DO NOTHING`,
          [
            entry.key,
            campaign.id,
            entry.agencyId,
            entry.position,
            entry.dueAt,
            entry.state,
            entry.attempts,
            entry.requestId,
            entry.lastError,
            entry.submittedAt,
          ]
        );
      }
    });
  }

  async updateEntry(campaignId: string, entry: PlanEntry, from: readonly PlanEntryState[]): Promise<PlanEntry | null> {
    await this.ready();
    const result = await this.database.query(
      `UPDATE campaign_plan_entries e SET
         due_at = $3,
         state = CASE WHEN c.cancelled_at IS NOT NULL AND $4::text = 'pending' THEN 'cancelled' ELSE $4::text END,
         attempts = $5,
         request_id = $6,
         last_error = $7,
         submitted_at = $8
       FROM campaigns c
       WHERE e.key = $1 AND e.campaign_id = $2 AND c.id = e.campaign_id AND e.state = ANY($9::text[])
       RETURNING e.*`,
      [
        entry.key,
        campaignId,
        entry.dueAt,
        entry.state,
        entry.attempts,
        entry.requestId,
        entry.lastError,
        entry.submittedAt,
        [...from],
      ]
    );
    return result.rows.length > 0 ? toEntry(entryRowSchema.parse(result.rows[0])) : null;
  }

  async listActiveCampaigns(): Promise<Campaign[]> {
    await this.ready();
    const result = await this.database.query<{ id: string }>(
      `SELECT DISTINCT c.id FROM campaigns c
       LEFT JOIN campaign_plan_entries e ON e.campaign_id = c.id
       LEFT JOIN foia_requests r ON r.campaign_id = c.id
       WHERE e.state IN ('pending', 'submitting', 'failed')
          OR r.status NOT IN ('completed', 'no_records', 'abandoned', 'rejected')
       ORDER BY c.id`
    );
    const campaigns = await Promise.all(result.rows.map((row) => this.getCampaign(row.id)));
    return campaigns.filter((campaign): campaign is Campaign => campaign !== null);
  }

  async getRequest(id: number): Promise<FoiaRequest | null> {
    await this.ready();
    const result = await this.database.query("SELECT * FROM foia_requests WHERE id = $1", [id]);
    return result.rows.length > 0 ? toRequest(requestRowSchema.parse(result.rows[0])) : null;
  }

  async saveRequest(request: FoiaRequest): Promise<void> {
    if (request.id === null) {
      throw new NotFound("Platform id for request", request.title);
    }
    await this.ready();
    await this.database.query(
      `INSERT INTO foia_requests (id, campaign_id, title, body, agency_id, organization_id, jurisdiction, filed_at, status, status_history, fee_amount, embargo, denials)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
       ON CONFLICT (id) DO UPDATE SET
         status = EXCLUDED.status,
         status_history = EXCLUDED.status_history,
         fee_amount = EXCLUDED.fee_amount,
         embargo = EXCLUDED.embargo,
         denials = EXCLUDED.denials,
         updated_at = NOW()`,
      [
        request.id,
        request.campaignId,
        request.title,
        request.body,
        request.agencyId,
        request.organizationId,
        request.jurisdiction,
        request.filedAt,
        request.status,
        JSON.stringify(request.statusHistory),
        request.feeAmount,
        request.embargo,
        JSON.stringify(request.denials),
      ]
    );
  }

  async listRequests(query: RequestQuery = {}): Promise<FoiaRequest[]> {
    await this.ready();
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (query.campaignId) {
      params.push(query.campaignId);
      conditions.push(`campaign_id = $${params.length}`);
    }
    if (query.statuses) {
      params.push([...query.statuses]);
      conditions.push(`status = ANY($${params.length}::text[])`);
    }
    if (query.agencyId !== undefined) {
      params.push(query.agencyId);
      conditions.push(`agency_id = $${params.length}`);
    }
    if (query.search) {
      params.push(`%${query.search.replace(/[\\%_]/g, "\\$&")}%`);
      conditions.push(`(title ILIKE $${params.length} OR body ILIKE $${params.length})`);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.database.query(`SELECT * FROM foia_requests ${where} ORDER BY id`, params);
    return result.rows.map((row) => toRequest(requestRowSchema.parse(row)));
  }

  async insertAppeal(appeal: StoredAppeal): Promise<boolean> {
    if (appeal.requestId === null) {
      throw new NotFound("Platform id for appealed request", appeal.denialEventAt);
    }
    await this.ready();
    const result = await this.database.query(
      `INSERT INTO appeals (request_id, denial_event_at, entries, unmatched_count, generated_at, letter_subject, letter_body, posted_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (request_id, denial_event_at) DO NOTHING`,
      [
        appeal.requestId,
        appeal.denialEventAt,
        JSON.stringify(appeal.entries),
        appeal.unmatchedCount,
        appeal.generatedAt,
        appeal.letterSubject,
        appeal.letterBody,
        appeal.postedAt,
      ]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listAppeals(requestId: number): Promise<StoredAppeal[]> {
    await this.ready();
    const result = await this.database.query(
      "SELECT * FROM appeals WHERE request_id = $1 ORDER BY denial_event_at",
      [requestId]
    );
    return result.rows.map((row) => toAppeal(appealRowSchema.parse(row)));
  }
}
