/**
 * Exemption code -> precedent lookup with family fallback.
 *
 * New exemption codes and precedents are data (data/precedents.json), not
 * code: the catalog is an ordered map plus exemptionFamily().
 */

import { z } from "zod";
import rawCatalog from "../../data/precedents.json";
import type { Precedent } from "./types";

export const EXEMPTION_CODES = [
  "b(1)",
  "b(2)",
  "b(3)",
  "b(4)",
  "b(5)",
  "b(6)",
  "b(7)",
  "b(7)(A)",
  "b(7)(B)",
  "b(7)(C)",
  "b(7)(D)",
  "b(7)(E)",
  "b(7)(F)",
  "b(8)",
  "b(9)",
] as const;

export type ExemptionCode = (typeof EXEMPTION_CODES)[number];

export const exemptionCodeSchema = z
  .string()
  .transform(normalizeExemptionCode)
  .pipe(z.enum(EXEMPTION_CODES));

const precedentSchema = z.object({
  citation: z.string().min(1),
  holding: z.string(),
  argument: z.string().min(1),
});

const catalogFileSchema = z.object({
  general: z.array(precedentSchema).default([]),
  exemptions: z.array(
    z.object({
      code: z.string().min(1),
      title: z.string(),
      precedents: z.array(precedentSchema).min(1),
    })
  ),
});

/** "(b)(7)(e)", "B7E", "b(7)(E)" all normalize to "b(7)(E)". */
export function normalizeExemptionCode(raw: string): string {
  const compact = raw.replace(/[\s§]/g, "").replace(/^exemption/i, "b");
  const match = /^\(?b\)?\(?(\d)\)?(?:\(?([a-f])\)?)?$/i.exec(compact);
  if (!match) return raw.trim();
  return match[2] ? `b(${match[1]})(${match[2].toUpperCase()})` : `b(${match[1]})`;
}

export function isExemptionCode(code: string): code is ExemptionCode {
  return (EXEMPTION_CODES as readonly string[]).includes(code);
}

/** Drops the last parenthesised group: b(7)(E) -> b(7) -> b -> null. */
export function exemptionFamily(code: string): string | null {
  const match = /^(.*)\([^()]*\)$/.exec(code);
  return match ? match[1] : null;
}

export interface CatalogEntry {
  code: string;
  title: string;
  precedents: Precedent[];
}

export interface PrecedentMatch {
  matchedCode: string;
  title: string;
  precedents: Precedent[];
  fallback: boolean;
}

export class PrecedentCatalog {
  private readonly entries = new Map<string, CatalogEntry>();
  readonly general: Precedent[];

  constructor(entries: CatalogEntry[], general: Precedent[] = []) {
    for (const entry of entries) this.entries.set(entry.code, entry);
    this.general = general;
  }

  static fromJson(raw: unknown): PrecedentCatalog {
    const parsed = catalogFileSchema.parse(raw);
    return new PrecedentCatalog(parsed.exemptions, parsed.general);
  }

  codes(): string[] {
    return [...this.entries.keys()];
  }

  get(code: string): CatalogEntry | undefined {
    return this.entries.get(code);
  }

  /** Exact match first, then each broader family in turn. */
  lookup(code: string): PrecedentMatch | null {
    let candidate: string | null = code;
    while (candidate) {
      const entry = this.entries.get(candidate);
      if (entry) {
        return {
          matchedCode: entry.code,
          title: entry.title,
          precedents: entry.precedents,
          fallback: candidate !== code,
        };
      }
      candidate = exemptionFamily(candidate);
    }
    return null;
  }
}

export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) => vars[key] ?? placeholder);
}

export const precedentCatalog = PrecedentCatalog.fromJson(rawCatalog);
