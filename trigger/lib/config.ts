import "dotenv/config";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

export const configSchema = z.object({
  DATABASE_URL: z.string().optional(),
  FOIA_API_URL: z.string().url().default("https://www.muckrock.com/api_v2/"),
  FOIA_API_TOKEN: z.string().optional(),
  FOIA_API_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  DUE_SOON_WARNING_DAYS: z.coerce.number().int().min(0).default(3),
  AUTO_FOLLOWUP: booleanFlag,
  APPEAL_DRAFT_MODE: z.enum(["template", "ai"]).default("template"),
  APPEAL_DRAFT_MODEL: z.string().default("o4-mini"),
  APPEAL_FALLBACK_MODEL: z.string().default("claude-sonnet-4-20250514"),
  SUBMISSION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
});

export type EngineConfig = z.infer<typeof configSchema>;

let cached: EngineConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function getConfig(): EngineConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
