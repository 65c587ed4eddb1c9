/**
 * HTTP implementation of FoiaPlatform against a MuckRock-style REST API.
 *
 * Token auth, zod-validated responses. Timeouts, 429 and 5xx surface as
 * TransientNetworkError; the client never retries on its own.
 */

import { z } from "zod";
import { CampaignEngineError, SubmissionRejected, TransientNetworkError, errorMessage } from "./errors";
import { createLogger, type Logger } from "./logger";
import { mapPlatformStatus, type FoiaPlatform } from "./platform";
import { createSubmittedRequest } from "./request-state";
import {
  pageSchema,
  platformAgencySchema,
  platformCommunicationSchema,
  platformErrorSchema,
  platformJurisdictionSchema,
  platformOrganizationSchema,
  platformRequestSchema,
  type PlatformAgency,
  type PlatformJurisdiction,
} from "./schemas";
import type {
  Agency,
  DenialReason,
  FoiaRequest,
  Organization,
  PlatformRequestSummary,
  PlatformStatusSnapshot,
  SubmitRequestInput,
} from "./types";

export interface MuckRockClientOptions {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  now?: () => Date;
}

type HttpMethod = "GET" | "POST";

export class MuckRockClient implements FoiaPlatform {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly jurisdictionCache = new Map<number, PlatformJurisdiction>();

  constructor(options: MuckRockClientOptions) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.logger ?? createLogger("muckrock-client");
    this.now = options.now ?? (() => new Date());
  }

  private async call(method: HttpMethod, path: string, body?: unknown, headers: Record<string, string> = {}): Promise<Response> {
    const url = new URL(path, this.baseUrl).toString();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Accept: "application/json",
          ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
          ...(this.token ? { Authorization: `Token ${this.token}` } : {}),
          ...headers,
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.log.warn("Platform request failed before a response", { method, path, error: errorMessage(error) });
      throw new TransientNetworkError(`${method} ${path} failed: ${errorMessage(error)}`, null, { method, path });
    }

    if (response.status === 429 || response.status >= 500) {
      throw new TransientNetworkError(`${method} ${path} returned ${response.status}`, response.status, { method, path });
    }
    return response;
  }

  private async readJson<T extends z.ZodTypeAny>(response: Response, schema: T, path: string): Promise<z.infer<T>> {
    const payload: unknown = await response.json();
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new CampaignEngineError("PLATFORM_PAYLOAD", `Unexpected payload from ${path}`, {
        path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  private async platformMessage(response: Response): Promise<string> {
    const text = await response.text();
    try {
      const parsed = platformErrorSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        if ("detail" in parsed.data && typeof parsed.data.detail === "string") return parsed.data.detail;
        return Object.entries(parsed.data)
          .map(([field, value]) => `${field}: ${Array.isArray(value) ? value.join(" ") : value}`)
          .join("; ");
      }
    } catch {
      // Not JSON; the raw body is the message
    }
    return text || `HTTP ${response.status}`;
  }

  private async get<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.infer<T> | null> {
    const response = await this.call("GET", path);
    if (response.status === 404) return null;
    if (!response.ok) {
      throw new CampaignEngineError("PLATFORM_REQUEST_FAILED", await this.platformMessage(response), {
        path,
        status: response.status,
      });
    }
    return this.readJson(response, schema, path);
  }

  private async post(path: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    const response = await this.call("POST", path, body, headers);
    if (!response.ok) {
      throw new SubmissionRejected(await this.platformMessage(response), { path, status: response.status });
    }
    return response;
  }

  private async jurisdiction(id: number): Promise<PlatformJurisdiction> {
    const cached = this.jurisdictionCache.get(id);
    if (cached) return cached;
    const jurisdiction = await this.get(`jurisdictions/${id}/`, platformJurisdictionSchema);
    if (!jurisdiction) {
      throw new CampaignEngineError("PLATFORM_PAYLOAD", `Jurisdiction ${id} not found`, { jurisdictionId: id });
    }
    this.jurisdictionCache.set(id, jurisdiction);
    return jurisdiction;
  }

  /** "federal", "CA", or "CA/los-angeles" for local bodies. */
  async jurisdictionCode(id: number): Promise<string> {
    const jurisdiction = await this.jurisdiction(id);
    if (jurisdiction.level === "f") return "federal";
    if (jurisdiction.level === "s") return (jurisdiction.abbrev ?? jurisdiction.name).toUpperCase();

    const parent = jurisdiction.parent ? await this.jurisdiction(jurisdiction.parent) : null;
    const state = parent?.abbrev ?? "";
    const locality = jurisdiction.slug ?? jurisdiction.name.toLowerCase().replace(/\s+/g, "-");
    return `${state.toUpperCase()}/${locality}`;
  }

  private async toAgency(raw: PlatformAgency): Promise<Agency> {
    const hasSchedule = raw.free_pages != null && raw.per_page_rate != null;
    return {
      id: raw.id,
      name: raw.name,
      jurisdiction: await this.jurisdictionCode(raw.jurisdiction),
      averageResponseDays: raw.average_response_time ?? null,
      feeRate: raw.fee_rate ?? null,
      successRate: raw.success_rate ?? null,
      feeSchedule: hasSchedule ? { freePageAllowance: raw.free_pages ?? 0, perPageRate: raw.per_page_rate ?? 0 } : null,
    };
  }

  async lookupAgency(id: number): Promise<Agency | null> {
    const raw = await this.get(`agencies/${id}/`, platformAgencySchema);
    return raw ? this.toAgency(raw) : null;
  }

  async searchAgencies(query: string, limit = 10): Promise<Agency[]> {
    const page = await this.get(`agencies/?search=${encodeURIComponent(query)}`, pageSchema(platformAgencySchema));
    const results = page?.results.slice(0, limit) ?? [];
    return Promise.all(results.map((raw) => this.toAgency(raw)));
  }

  async searchRequests(query: string, limit = 10): Promise<PlatformRequestSummary[]> {
    const path = `requests/?search=${encodeURIComponent(query)}&page_size=${limit}`;
    const page = await this.get(path, pageSchema(platformRequestSchema));
    return (page?.results.slice(0, limit) ?? []).map((raw) => ({
      id: raw.id,
      title: raw.title,
      status: mapPlatformStatus(raw.status, { requestId: raw.id }),
      agencyId: raw.agency,
      submittedAt: raw.datetime_submitted ? new Date(raw.datetime_submitted).toISOString() : null,
    }));
  }

  async listUserOrganizations(): Promise<Organization[]> {
    const page = await this.get("organizations/", pageSchema(platformOrganizationSchema));
    return (page?.results ?? []).map((org) => ({ id: org.id, name: org.name, ownerUserId: org.owner ?? null }));
  }

  async submitRequest(input: SubmitRequestInput, idempotencyKey: string): Promise<FoiaRequest> {
    const agency = await this.lookupAgency(input.agencyId);
    if (!agency) throw new SubmissionRejected(`Agency ${input.agencyId} does not exist`, { agencyId: input.agencyId });

    const response = await this.post(
      "requests/",
      {
        title: input.title,
        requested_docs: input.body,
        agencies: [input.agencyId],
        organization: input.organizationId ?? undefined,
        embargo: input.embargo,
        request_fee_waiver: input.requestFeeWaiver ?? false,
      },
      { "Idempotency-Key": idempotencyKey }
    );
    const created = await this.readJson(response, platformRequestSchema, "requests/");
    this.log.info("Request submitted", { requestId: created.id, agencyId: input.agencyId, idempotencyKey });

    return createSubmittedRequest({
      id: created.id,
      title: created.title,
      body: input.body,
      agencyId: input.agencyId,
      organizationId: input.organizationId,
      jurisdiction: agency.jurisdiction,
      filedAt: created.datetime_submitted ?? this.now().toISOString(),
      embargo: created.embargo ?? input.embargo,
    });
  }

  async fetchRequestStatus(id: number): Promise<PlatformStatusSnapshot> {
    const request = await this.get(`requests/${id}/`, platformRequestSchema);
    if (!request) throw new CampaignEngineError("NOT_FOUND", `Request ${id} not found on the platform`, { requestId: id });
    const communications = await this.get(`communications/?foia=${id}`, pageSchema(platformCommunicationSchema));

    const history = (communications?.results ?? [])
      .filter((comm) => comm.status)
      .map((comm) => ({ status: mapPlatformStatus(comm.status ?? "", { requestId: id }), at: new Date(comm.datetime).toISOString() }))
      .sort((a, b) => a.at.localeCompare(b.at));

    const price = request.price == null ? null : Number(request.price);
    const denialReasons: DenialReason[] = (request.exemptions ?? []).map((exemption) => ({
      exemptionCode: exemption.code,
      justification: exemption.justification,
    }));

    return {
      status: mapPlatformStatus(request.status, { requestId: id }),
      observedAt: request.datetime_updated ? new Date(request.datetime_updated).toISOString() : this.now().toISOString(),
      history,
      feeAmount: price !== null && Number.isFinite(price) && price > 0 ? price : null,
      denialReasons,
    };
  }

  async postFollowup(id: number, message: string): Promise<void> {
    await this.post(`requests/${id}/followups/`, { communication: message });
    this.log.info("Follow-up posted", { requestId: id, length: message.length });
  }

  async postAppeal(id: number, appealText: string, idempotencyKey: string): Promise<void> {
    await this.post(`requests/${id}/appeals/`, { communication: appealText }, { "Idempotency-Key": idempotencyKey });
    this.log.info("Appeal posted", { requestId: id, length: appealText.length });
  }
}
