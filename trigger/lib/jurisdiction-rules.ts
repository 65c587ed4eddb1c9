/**
 * Statutory response windows, holiday calendars and default fee schedules per
 * jurisdiction. The table lives in data/jurisdictions.json.
 *
 * Codes are "federal", a two-letter state code ("CA"), or a local code under a
 * state ("CA/los-angeles"), which inherits the state's rules.
 */

import { addDays, format, getDay, isWeekend, lastDayOfMonth, subDays } from "date-fns";
import { z } from "zod";
import rawRules from "../../data/jurisdictions.json";
import { UnknownJurisdiction } from "./errors";
import type { FeeSchedule } from "./types";

const feeScheduleSchema = z.object({
  freePageAllowance: z.number().int().min(0),
  perPageRate: z.number().min(0),
});

const fixedHolidaySchema = z.object({
  name: z.string(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
});

const floatingHolidaySchema = z.object({
  name: z.string(),
  month: z.number().int().min(1).max(12),
  weekday: z.number().int().min(0).max(6),
  // 1..5 counts from the start of the month, -1 is the last occurrence
  nth: z.number().int().min(-1).max(5),
});

const calendarSchema = z.object({
  extends: z.string().optional(),
  fixed: z.array(fixedHolidaySchema),
  floating: z.array(floatingHolidaySchema),
});

const rulesFileSchema = z.object({
  defaults: z.object({ calendar: z.string(), feeSchedule: feeScheduleSchema }),
  calendars: z.record(calendarSchema),
  jurisdictions: z.record(
    z.object({
      name: z.string(),
      responseDays: z.number().int().positive(),
      calendar: z.string().optional(),
      feeSchedule: feeScheduleSchema.optional(),
    })
  ),
});

export type HolidayCalendar = z.infer<typeof calendarSchema>;

export interface JurisdictionRule {
  code: string;
  name: string;
  /** Statutory response window in business days. */
  responseDays: number;
  calendar: string;
  feeSchedule: FeeSchedule;
}

export type RulesFile = z.infer<typeof rulesFileSchema>;

export class JurisdictionRules {
  private readonly file: RulesFile;
  private readonly holidayCache = new Map<string, Set<string>>();

  constructor(file: unknown) {
    this.file = rulesFileSchema.parse(file);
  }

  static normalize(code: string): string {
    const trimmed = code.trim();
    if (/^(federal|us|usa)$/i.test(trimmed)) return "federal";
    const [state, ...locality] = trimmed.split("/");
    const upper = state.toUpperCase();
    return locality.length > 0 ? `${upper}/${locality.join("/").toLowerCase()}` : upper;
  }

  codes(): string[] {
    return Object.keys(this.file.jurisdictions);
  }

  get(code: string): JurisdictionRule {
    const normalized = JurisdictionRules.normalize(code);
    const direct = this.file.jurisdictions[normalized];
    const parentCode = normalized.split("/")[0];
    const entry = direct ?? this.file.jurisdictions[parentCode];
    if (!entry) throw new UnknownJurisdiction(code);

    return {
      code: normalized,
      name: entry.name,
      responseDays: entry.responseDays,
      calendar: entry.calendar ?? this.file.defaults.calendar,
      feeSchedule: entry.feeSchedule ?? this.file.defaults.feeSchedule,
    };
  }

  isHoliday(date: Date, calendar: string): boolean {
    return this.holidaysFor(calendar, date.getFullYear()).has(toDateKey(date));
  }

  isBusinessDay(date: Date, calendar: string): boolean {
    return !isWeekend(date) && !this.isHoliday(date, calendar);
  }

  /** Observed holiday dates (yyyy-MM-dd) falling in or touching the given year. */
  holidaysFor(calendar: string, year: number): Set<string> {
    const cacheKey = `${calendar}:${year}`;
    const cached = this.holidayCache.get(cacheKey);
    if (cached) return cached;

    const dates = new Set<string>();
    // Jan 1 of the next year can be observed on Dec 31 of this one
    for (const ruleYear of [year, year + 1]) {
      for (const holiday of this.resolveCalendar(calendar)) {
        dates.add(toDateKey(holiday(ruleYear)));
      }
    }
    this.holidayCache.set(cacheKey, dates);
    return dates;
  }

  private resolveCalendar(key: string, seen: string[] = []): Array<(year: number) => Date> {
    const calendar = this.file.calendars[key];
    if (!calendar) throw new UnknownJurisdiction(key, { calendar: key });
    if (seen.includes(key)) {
      throw new UnknownJurisdiction(key, { calendar: key, cycle: [...seen, key] });
    }

    const inherited = calendar.extends ? this.resolveCalendar(calendar.extends, [...seen, key]) : [];
    return [
      ...inherited,
      ...calendar.fixed.map((holiday) => (year: number) => observed(new Date(year, holiday.month - 1, holiday.day))),
      ...calendar.floating.map((holiday) => (year: number) => nthWeekday(year, holiday.month, holiday.weekday, holiday.nth)),
    ];
  }
}

export function toDateKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

// Saturday holidays are observed the Friday before, Sunday ones the Monday after.
function observed(date: Date): Date {
  const weekday = getDay(date);
  if (weekday === 6) return subDays(date, 1);
  if (weekday === 0) return addDays(date, 1);
  return date;
}

function nthWeekday(year: number, month: number, weekday: number, nth: number): Date {
  if (nth === -1) {
    const last = lastDayOfMonth(new Date(year, month - 1, 1));
    return subDays(last, (getDay(last) - weekday + 7) % 7);
  }
  const first = new Date(year, month - 1, 1);
  return addDays(first, ((weekday - getDay(first) + 7) % 7) + (nth - 1) * 7);
}

export const jurisdictionRules = new JurisdictionRules(rawRules);
