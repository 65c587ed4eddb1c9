import { z } from "zod";

/**
 * Records-platform payloads. Only the fields the engine reads are declared;
 * everything else the API returns is ignored.
 */
export const platformJurisdictionSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  abbrev: z.string().nullable().optional(),
  slug: z.string().nullable().optional(),
  level: z.enum(["f", "s", "l"]),
  parent: z.number().int().nullable().optional(),
});

export type PlatformJurisdiction = z.infer<typeof platformJurisdictionSchema>;

export const platformAgencySchema = z.object({
  id: z.number().int(),
  name: z.string(),
  jurisdiction: z.number().int(),
  average_response_time: z.number().nullable().optional(),
  fee_rate: z.number().nullable().optional(),
  success_rate: z.number().nullable().optional(),
  free_pages: z.number().int().min(0).nullable().optional(),
  per_page_rate: z.number().min(0).nullable().optional(),
});

export type PlatformAgency = z.infer<typeof platformAgencySchema>;

export const platformOrganizationSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  owner: z.number().int().nullable().optional(),
});

export const platformExemptionSchema = z.object({
  code: z.string().min(1),
  justification: z.string().default(""),
});

export const platformCommunicationSchema = z.object({
  id: z.number().int(),
  datetime: z.string(),
  from_user: z.boolean().optional(),
  status: z.string().nullable().optional(),
});

export const platformRequestSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  status: z.string(),
  agency: z.number().int(),
  organization: z.number().int().nullable().optional(),
  datetime_submitted: z.string().nullable().optional(),
  datetime_updated: z.string().nullable().optional(),
  price: z.union([z.number(), z.string()]).nullable().optional(),
  embargo: z.boolean().optional(),
  exemptions: z.array(platformExemptionSchema).optional(),
});

export type PlatformRequest = z.infer<typeof platformRequestSchema>;

export function pageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    next: z.string().nullable().optional(),
    results: z.array(item),
  });
}

export const platformErrorSchema = z.union([
  z.object({ detail: z.string() }),
  z.record(z.union([z.string(), z.array(z.string())])),
]);

// Task payloads

export const startCampaignPayloadSchema = z.object({
  title: z.string().trim().min(1),
  body: z.string().trim().min(1),
  targets: z.array(z.number().int().positive()).min(1),
  organizationHint: z.string().nullable().optional(),
  /** One of the user's organizations, by platform id; takes precedence over the hint. */
  organizationId: z.number().int().positive().optional(),
  staggerIntervalMs: z.number().int().min(0).default(0),
  startAt: z.string().datetime({ offset: true }).optional(),
  embargo: z.boolean().default(false),
});

export type StartCampaignPayload = z.infer<typeof startCampaignPayloadSchema>;

export const extendCampaignPayloadSchema = z.object({
  campaignId: z.string().min(1),
  targets: z.array(z.number().int().positive()).min(1),
});

export type ExtendCampaignPayload = z.infer<typeof extendCampaignPayloadSchema>;

export const cancelCampaignPayloadSchema = z.object({
  campaignId: z.string().min(1),
});

export const executeCampaignPlanPayloadSchema = z.object({
  campaignId: z.string().min(1),
});

export type ExecuteCampaignPlanPayload = z.infer<typeof executeCampaignPlanPayloadSchema>;

export const syncRequestPayloadSchema = z.object({
  requestId: z.number().int().positive(),
});

export type SyncRequestPayload = z.infer<typeof syncRequestPayloadSchema>;

export const fileAppealPayloadSchema = z.object({
  requestId: z.number().int().positive(),
  /** False previews the appeal without posting it or changing status. */
  submit: z.boolean().default(false),
});

export type FileAppealPayload = z.infer<typeof fileAppealPayloadSchema>;

export const retryCampaignEntryPayloadSchema = z.object({
  campaignId: z.string().min(1),
  key: z.string().min(1),
});

export type RetryCampaignEntryPayload = z.infer<typeof retryCampaignEntryPayloadSchema>;

export const liftEmbargoPayloadSchema = z.object({
  requestId: z.number().int().positive(),
});

export const postFollowupPayloadSchema = z.object({
  requestId: z.number().int().positive(),
  /** Sent as written; the deadline-based message is used when omitted. */
  message: z.string().trim().min(1).optional(),
});

export type PostFollowupPayload = z.infer<typeof postFollowupPayloadSchema>;

export const requestStatusSchema = z.enum([
  "submitted",
  "acknowledged",
  "processing",
  "fix_required",
  "payment_required",
  "appealing",
  "partial",
  "rejected",
  "no_records",
  "completed",
  "abandoned",
]);

export const listRequestsPayloadSchema = z.object({
  campaignId: z.string().min(1).optional(),
  agencyId: z.number().int().positive().optional(),
  statuses: z.array(requestStatusSchema).min(1).optional(),
  search: z.string().trim().min(1).optional(),
});

export type ListRequestsPayload = z.infer<typeof listRequestsPayloadSchema>;

export const searchRequestsPayloadSchema = z.object({
  query: z.string().trim().min(2),
  limit: z.number().int().min(1).max(50).default(10),
});

export type SearchRequestsPayload = z.infer<typeof searchRequestsPayloadSchema>;

export const findAgenciesPayloadSchema = z.object({
  query: z.string().trim().min(2),
  limit: z.number().int().min(1).max(50).default(10),
});

export type FindAgenciesPayload = z.infer<typeof findAgenciesPayloadSchema>;

/**
 * Structured output for the AI-polished appeal letter.
 * Used with Vercel AI SDK generateObject().
 */
export const appealLetterSchema = z.object({
  subject: z.string().min(1).describe("Subject line for the appeal"),
  body_text: z
    .string()
    .min(50)
    .describe("Full appeal letter text. Must keep every citation from the draft verbatim and must not add new ones."),
}).strict();

export type AppealLetterOutput = z.infer<typeof appealLetterSchema>;
