import { InvalidInput } from "./errors";
import { jurisdictionRules, type JurisdictionRules } from "./jurisdiction-rules";
import type { Agency, FeeSchedule, RequesterCategory } from "./types";

export type WaiverBasis = "presumptive" | "public_interest" | "ineligible";

export interface CostEstimateInput {
  agency: Pick<Agency, "id" | "jurisdiction" | "feeSchedule">;
  pageCount: number;
  requesterCategory: RequesterCategory;
  requestFeeWaiver: boolean;
}

export interface CostEstimate {
  /** Always true: agencies assess the real fee. */
  isEstimate: true;
  estimatedFee: number;
  billablePages: number;
  feeSchedule: FeeSchedule;
  feeScheduleSource: "agency" | "jurisdiction";
  waiverEligible: boolean;
  waiverBasis: WaiverBasis;
  label: string;
}

const PRESUMPTIVE_WAIVER: readonly RequesterCategory[] = ["news_media", "educational"];

function roundCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

function waiverBasis(category: RequesterCategory, requested: boolean): WaiverBasis {
  if (PRESUMPTIVE_WAIVER.includes(category)) return "presumptive";
  if (category === "individual" && requested) return "public_interest";
  return "ineligible";
}

export function estimateCost(input: CostEstimateInput, rules: JurisdictionRules = jurisdictionRules): CostEstimate {
  if (!Number.isInteger(input.pageCount) || input.pageCount < 0) {
    throw new InvalidInput(`pageCount must be a non-negative integer, got ${input.pageCount}`, {
      agencyId: input.agency.id,
      pageCount: input.pageCount,
    });
  }

  const agencySchedule = input.agency.feeSchedule ?? null;
  const feeSchedule = agencySchedule ?? rules.get(input.agency.jurisdiction).feeSchedule;
  const billablePages = Math.max(0, input.pageCount - feeSchedule.freePageAllowance);
  const estimatedFee = roundCents(billablePages * feeSchedule.perPageRate);
  const basis = waiverBasis(input.requesterCategory, input.requestFeeWaiver);

  return {
    isEstimate: true,
    estimatedFee,
    billablePages,
    feeSchedule,
    feeScheduleSource: agencySchedule ? "agency" : "jurisdiction",
    waiverEligible: basis !== "ineligible",
    waiverBasis: basis,
    label: `Estimated fee: $${estimatedFee.toFixed(2)} (estimate only; the agency assesses actual fees)`,
  };
}
