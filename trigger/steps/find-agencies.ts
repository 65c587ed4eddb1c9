/**
 * Find Agencies Step
 *
 * Agency search for building a campaign's target list. Each match carries
 * the statute's response window and the due date a request filed now would
 * get, so the requester can see the deadlines before planning.
 */

import { statutoryDueDate } from "../lib/deadlines";
import type { EngineDeps } from "../lib/engine";
import { UnknownJurisdiction } from "../lib/errors";
import type { FindAgenciesPayload } from "../lib/schemas";
import type { Agency } from "../lib/types";

export interface AgencyMatch {
  agency: Agency;
  /** Null when the agency's jurisdiction has no rules on file. */
  deadline: { jurisdictionName: string; responseDays: number; dueIfFiledNow: string } | null;
}

export async function findAgencies(input: FindAgenciesPayload, deps: EngineDeps): Promise<AgencyMatch[]> {
  const agencies = await deps.platform.searchAgencies(input.query, input.limit);
  const filedAt = deps.now().toISOString();

  return agencies.map((agency) => {
    try {
      const rule = deps.rules.get(agency.jurisdiction);
      return {
        agency,
        deadline: {
          jurisdictionName: rule.name,
          responseDays: rule.responseDays,
          dueIfFiledNow: statutoryDueDate(agency.jurisdiction, filedAt, deps.rules),
        },
      };
    } catch (error) {
      if (!(error instanceof UnknownJurisdiction)) throw error;
      deps.logger.warn("No deadline rules for agency jurisdiction", { agencyId: agency.id, jurisdiction: agency.jurisdiction });
      return { agency, deadline: null };
    }
  });
}
