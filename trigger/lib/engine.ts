// Wiring for steps: everything a step touches outside its own arguments.
// Tasks use defaultDeps(); tests pass in-memory stand-ins.

import { PgCampaignStore, type CampaignStore } from "./campaign-store";
import { getConfig, type EngineConfig } from "./config";
import { jurisdictionRules, type JurisdictionRules } from "./jurisdiction-rules";
import { createLogger, type Logger } from "./logger";
import { MuckRockClient } from "./muckrock-client";
import type { FoiaPlatform } from "./platform";
import { precedentCatalog, type PrecedentCatalog } from "./precedent-catalog";
import { requestLock, type RequestLock } from "./request-lock";

export interface EngineDeps {
  store: CampaignStore;
  platform: FoiaPlatform;
  lock: RequestLock;
  config: EngineConfig;
  rules: JurisdictionRules;
  catalog: PrecedentCatalog;
  logger: Logger;
  now: () => Date;
}

let cached: EngineDeps | null = null;

export function defaultDeps(): EngineDeps {
  if (cached) return cached;
  const config = getConfig();
  cached = {
    store: new PgCampaignStore(),
    platform: new MuckRockClient({
      baseUrl: config.FOIA_API_URL,
      token: config.FOIA_API_TOKEN,
      timeoutMs: config.FOIA_API_TIMEOUT_MS,
    }),
    lock: requestLock,
    config,
    rules: jurisdictionRules,
    catalog: precedentCatalog,
    logger: createLogger("foia-campaign-engine"),
    now: () => new Date(),
  };
  return cached;
}
