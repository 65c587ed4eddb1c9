import type { Organization } from "./types";

export type OrganizationSelection =
  | { kind: "selected"; organization: Organization; reason: "chosen" | "only_option" | "exact_name" | "hint_match" }
  | { kind: "ambiguous"; hint: string; matches: Organization[] }
  | { kind: "needs_choice"; options: Organization[]; unmatchedHint: string | null }
  | { kind: "individual" };

/**
 * Picks the filing organization. Never prompts and never throws: ambiguity is
 * returned to the caller, which owns how to ask the user.
 *
 * An explicit organization id wins over the hint. A hint that equals one
 * organization's whole name picks it even when it is also part of another
 * organization's name.
 */
export function selectOrganization(
  organizations: readonly Organization[],
  hint?: string | null,
  organizationId?: number | null
): OrganizationSelection {
  if (organizations.length === 0) return { kind: "individual" };
  const chosen = organizationId == null ? undefined : organizations.find((org) => org.id === organizationId);
  if (chosen) return { kind: "selected", organization: chosen, reason: "chosen" };
  if (organizations.length === 1) {
    return { kind: "selected", organization: organizations[0], reason: "only_option" };
  }

  const needle = hint?.trim().toLowerCase() ?? "";
  if (!needle) return { kind: "needs_choice", options: [...organizations], unmatchedHint: null };

  const matches = organizations.filter((org) => org.name.toLowerCase().includes(needle));
  const exact = matches.filter((org) => org.name.trim().toLowerCase() === needle);
  if (exact.length === 1) return { kind: "selected", organization: exact[0], reason: "exact_name" };
  if (matches.length === 1) return { kind: "selected", organization: matches[0], reason: "hint_match" };
  if (matches.length > 1) return { kind: "ambiguous", hint: hint?.trim() ?? needle, matches };
  return { kind: "needs_choice", options: [...organizations], unmatchedHint: hint?.trim() ?? needle };
}

/** Filer id for a resolved selection; undefined while the user still has to choose. */
export function filerId(selection: OrganizationSelection): number | null | undefined {
  switch (selection.kind) {
    case "selected":
      return selection.organization.id;
    case "individual":
      return null;
    case "ambiguous":
    case "needs_choice":
      return undefined;
  }
}
