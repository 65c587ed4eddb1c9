import type { CampaignStore, RequestQuery, StoredAppeal } from "../../trigger/lib/campaign-store";
import type { Campaign, FoiaRequest, PlanEntry, PlanEntryState } from "../../trigger/lib/types";
import { isTerminal } from "../../trigger/lib/request-state";

function storedState(campaign: Campaign, state: PlanEntryState): PlanEntryState {
  return campaign.cancelledAt !== null && state === "pending" ? "cancelled" : state;
}

/**
 * In-process CampaignStore. Values are cloned on the way in and out, like a
 * real database, and entry writes follow the same rules as PgCampaignStore.
 */
export class InMemoryCampaignStore implements CampaignStore {
  readonly campaigns = new Map<string, Campaign>();
  readonly requests = new Map<number, FoiaRequest>();
  readonly appeals: StoredAppeal[] = [];

  async getCampaign(id: string): Promise<Campaign | null> {
    const campaign = this.campaigns.get(id);
    if (!campaign) return null;
    const copy = structuredClone(campaign);
    copy.members = [...copy.entries]
      .sort((a, b) => a.position - b.position)
      .flatMap((entry) =>
        entry.state === "submitted" && entry.requestId !== null
          ? [{ requestId: entry.requestId, agencyId: entry.agencyId, position: entry.position }]
          : []
      );
    return copy;
  }

  async saveCampaign(campaign: Campaign): Promise<void> {
    const existing = this.campaigns.get(campaign.id);
    const merged = structuredClone(campaign);
    merged.cancelledAt = existing?.cancelledAt ?? campaign.cancelledAt;
    if (existing) {
      const storedKeys = new Set(existing.entries.map((entry) => entry.key));
      const added = merged.entries.filter((entry) => !storedKeys.has(entry.key));
      merged.entries = [...existing.entries, ...added.map((entry) => ({ ...entry, state: storedState(merged, entry.state) }))];
    } else {
      merged.entries = merged.entries.map((entry) => ({ ...entry, state: storedState(merged, entry.state) }));
    }
    this.campaigns.set(campaign.id, merged);
  }

  async updateEntry(campaignId: string, entry: PlanEntry, from: readonly PlanEntryState[]): Promise<PlanEntry | null> {
    const campaign = this.campaigns.get(campaignId);
    const index = campaign?.entries.findIndex((stored) => stored.key === entry.key) ?? -1;
    if (!campaign || index < 0 || !from.includes(campaign.entries[index].state)) return null;
    const written: PlanEntry = { ...structuredClone(entry), state: storedState(campaign, entry.state) };
    campaign.entries[index] = written;
    return structuredClone(written);
  }

  async listActiveCampaigns(): Promise<Campaign[]> {
    const active = [...this.campaigns.values()].filter((campaign) => {
      const openEntry = campaign.entries.some((entry) => ["pending", "submitting", "failed"].includes(entry.state));
      const openMember = [...this.requests.values()].some(
        (request) => request.campaignId === campaign.id && !isTerminal(request.status)
      );
      return openEntry || openMember;
    });
    return active.map((campaign) => structuredClone(campaign));
  }

  async getRequest(id: number): Promise<FoiaRequest | null> {
    const request = this.requests.get(id);
    return request ? structuredClone(request) : null;
  }

  async saveRequest(request: FoiaRequest): Promise<void> {
    if (request.id === null) throw new Error("request has no id");
    this.requests.set(request.id, structuredClone(request));
  }

  async listRequests(query: RequestQuery = {}): Promise<FoiaRequest[]> {
    return [...this.requests.values()]
      .filter((request) => query.campaignId === undefined || request.campaignId === query.campaignId)
      .filter((request) => !query.statuses || query.statuses.includes(request.status))
      .filter((request) => query.agencyId === undefined || request.agencyId === query.agencyId)
      .filter((request) => {
        const needle = query.search?.toLowerCase();
        return !needle || request.title.toLowerCase().includes(needle) || request.body.toLowerCase().includes(needle);
      })
      .sort((a, b) => (a.id ?? 0) - (b.id ?? 0))
      .map((request) => structuredClone(request));
  }

  async insertAppeal(appeal: StoredAppeal): Promise<boolean> {
    const exists = this.appeals.some(
      (stored) => stored.requestId === appeal.requestId && stored.denialEventAt === appeal.denialEventAt
    );
    if (exists) return false;
    this.appeals.push(structuredClone(appeal));
    return true;
  }

  async listAppeals(requestId: number): Promise<StoredAppeal[]> {
    return this.appeals.filter((appeal) => appeal.requestId === requestId).map((appeal) => structuredClone(appeal));
  }
}
