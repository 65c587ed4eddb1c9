/**
 * Statutory deadline and compliance verdict for a single request.
 *
 * The due date is the filing date advanced by the jurisdiction's response
 * window in business days (weekends and the jurisdiction's holidays skipped).
 * Time spent in fix_required / payment_required does not count against the
 * agency: those business days push the due date forward one for one.
 */

import { addDays, isAfter, isValid, parseISO, startOfDay } from "date-fns";
import { InvalidInput } from "./errors";
import { jurisdictionRules, toDateKey, type JurisdictionRules } from "./jurisdiction-rules";
import { PAUSED_STATUSES, isTerminal } from "./request-state";
import type { ComplianceVerdict, DeadlineResult, RequestStatus, StatusHistoryEntry } from "./types";

export const DEFAULT_WARNING_DAYS = 3;

export interface DeadlineInput {
  jurisdiction: string;
  filedAt: string;
  status: RequestStatus;
  statusHistory: StatusHistoryEntry[];
}

export interface DeadlineOptions {
  now?: Date;
  warningDays?: number;
  rules?: JurisdictionRules;
}

function toDay(value: string, field: string): Date {
  const parsed = parseISO(value);
  if (!isValid(parsed)) throw new InvalidInput(`Invalid ${field}: "${value}"`, { [field]: value });
  return startOfDay(parsed);
}

export function addBusinessDays(start: Date, days: number, calendar: string, rules: JurisdictionRules = jurisdictionRules): Date {
  let cursor = startOfDay(start);
  let remaining = days;
  while (remaining > 0) {
    cursor = addDays(cursor, 1);
    if (rules.isBusinessDay(cursor, calendar)) remaining -= 1;
  }
  return cursor;
}

/** Business days d with from < d <= to. Zero when `to` is not after `from`. */
export function countBusinessDays(from: Date, to: Date, calendar: string, rules: JurisdictionRules = jurisdictionRules): number {
  let cursor = startOfDay(from);
  const end = startOfDay(to);
  let count = 0;
  while (isAfter(end, cursor)) {
    cursor = addDays(cursor, 1);
    if (rules.isBusinessDay(cursor, calendar)) count += 1;
  }
  return count;
}

export function pausedBusinessDays(
  history: StatusHistoryEntry[],
  now: Date,
  calendar: string,
  rules: JurisdictionRules = jurisdictionRules
): number {
  let total = 0;
  history.forEach((entry, index) => {
    if (!PAUSED_STATUSES.includes(entry.status)) return;
    const next = history[index + 1];
    const resumedAt = next ? toDay(next.at, "statusHistory.at") : startOfDay(now);
    total += countBusinessDays(toDay(entry.at, "statusHistory.at"), resumedAt, calendar, rules);
  });
  return total;
}

/**
 * Due date only, without a verdict. Useful for previewing the deadline of a
 * request that has not been filed yet.
 */
export function statutoryDueDate(jurisdiction: string, filedAt: string, rules: JurisdictionRules = jurisdictionRules): string {
  const rule = rules.get(jurisdiction);
  return toDateKey(addBusinessDays(toDay(filedAt, "filedAt"), rule.responseDays, rule.calendar, rules));
}

export function computeDeadline(input: DeadlineInput, options: DeadlineOptions = {}): DeadlineResult {
  const rules = options.rules ?? jurisdictionRules;
  const warningDays = options.warningDays ?? DEFAULT_WARNING_DAYS;
  if (!Number.isInteger(warningDays) || warningDays < 0) {
    throw new InvalidInput(`warningDays must be a non-negative integer, got ${warningDays}`, { warningDays });
  }

  const rule = rules.get(input.jurisdiction);
  const now = options.now ?? new Date();
  const today = startOfDay(now);
  const filed = toDay(input.filedAt, "filedAt");

  const paused = pausedBusinessDays(input.statusHistory, now, rule.calendar, rules);
  const due = addBusinessDays(filed, rule.responseDays + paused, rule.calendar, rules);

  const businessDaysRemaining = isAfter(today, due)
    ? 0 - countBusinessDays(due, today, rule.calendar, rules)
    : countBusinessDays(today, due, rule.calendar, rules);

  let verdict: ComplianceVerdict;
  if (isTerminal(input.status)) {
    verdict = "not_applicable";
  } else if (isAfter(today, due)) {
    verdict = "overdue";
  } else if (businessDaysRemaining <= warningDays) {
    verdict = "due_soon";
  } else {
    verdict = "on_track";
  }

  return {
    jurisdiction: rule.code,
    dueDate: toDateKey(due),
    verdict,
    pausedBusinessDays: paused,
    businessDaysRemaining,
  };
}
