import { describe, expect, it } from "vitest";
import { UnknownJurisdiction } from "../trigger/lib/errors";
import { JurisdictionRules, jurisdictionRules, toDateKey } from "../trigger/lib/jurisdiction-rules";

describe("JurisdictionRules", () => {
  it("covers federal, every state and DC", () => {
    const codes = jurisdictionRules.codes();
    expect(codes).toHaveLength(52);
    expect(codes).toContain("federal");
    expect(codes).toContain("DC");
  });

  it("returns the statutory window and default calendar", () => {
    expect(jurisdictionRules.get("federal")).toEqual({
      code: "federal",
      name: "United States (federal)",
      responseDays: 20,
      calendar: "federal",
      feeSchedule: { freePageAllowance: 100, perPageRate: 0.1 },
    });
    expect(jurisdictionRules.get("NY").responseDays).toBe(5);
    expect(jurisdictionRules.get("NY").calendar).toBe("federal");
    expect(jurisdictionRules.get("CA").calendar).toBe("CA");
  });

  it("normalizes codes", () => {
    expect(JurisdictionRules.normalize(" usa ")).toBe("federal");
    expect(JurisdictionRules.normalize("ca")).toBe("CA");
    expect(JurisdictionRules.normalize("ca/Los-Angeles")).toBe("CA/los-angeles");
  });

  it("lets local bodies inherit their state's rules", () => {
    const local = jurisdictionRules.get("CA/los-angeles");
    expect(local.code).toBe("CA/los-angeles");
    expect(local.responseDays).toBe(10);
    expect(local.calendar).toBe("CA");
  });

  it("throws UnknownJurisdiction for codes it has no rules for", () => {
    expect(() => jurisdictionRules.get("ZZ")).toThrow(UnknownJurisdiction);
  });

  it("computes floating federal holidays", () => {
    const holidays = jurisdictionRules.holidaysFor("federal", 2025);
    for (const day of ["2025-01-20", "2025-02-17", "2025-05-26", "2025-09-01", "2025-10-13", "2025-11-27"]) {
      expect(holidays.has(day)).toBe(true);
    }
  });

  it("moves weekend holidays to the observed weekday", () => {
    // Christmas 2027 and New Year's Day 2028 both fall on a Saturday
    expect(jurisdictionRules.isHoliday(new Date(2027, 11, 24), "federal")).toBe(true);
    expect(jurisdictionRules.isHoliday(new Date(2027, 11, 31), "federal")).toBe(true);
    expect(jurisdictionRules.isHoliday(new Date(2027, 11, 27), "federal")).toBe(false);
  });

  it("adds state holidays on top of the federal calendar", () => {
    expect(jurisdictionRules.isHoliday(new Date(2025, 2, 31), "CA")).toBe(true);
    expect(jurisdictionRules.isHoliday(new Date(2025, 2, 31), "federal")).toBe(false);
    expect(jurisdictionRules.isHoliday(new Date(2025, 10, 28), "CA")).toBe(true);
    expect(jurisdictionRules.isHoliday(new Date(2025, 3, 21), "MA")).toBe(true);
  });

  it("treats weekends and holidays as non-business days", () => {
    expect(jurisdictionRules.isBusinessDay(new Date(2025, 5, 19), "federal")).toBe(false);
    expect(jurisdictionRules.isBusinessDay(new Date(2025, 5, 21), "federal")).toBe(false);
    expect(jurisdictionRules.isBusinessDay(new Date(2025, 5, 20), "federal")).toBe(true);
  });

  it("rejects calendars that extend each other in a cycle", () => {
    const rules = new JurisdictionRules({
      defaults: { calendar: "a", feeSchedule: { freePageAllowance: 0, perPageRate: 0 } },
      calendars: {
        a: { extends: "b", fixed: [], floating: [] },
        b: { extends: "a", fixed: [], floating: [] },
      },
      jurisdictions: { XX: { name: "Nowhere", responseDays: 5 } },
    });
    expect(() => rules.isHoliday(new Date(2025, 0, 2), "a")).toThrow(UnknownJurisdiction);
  });

  it("formats date keys", () => {
    expect(toDateKey(new Date(2025, 0, 5))).toBe("2025-01-05");
  });
});
