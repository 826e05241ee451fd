import { describe, expect, it } from "vitest";

import { ValidationError } from "../domain/errors.js";
import {
  addDays,
  computeWeekNumber,
  formatDisplayDate,
  formatIsoDate,
  formatRange,
  getCurrentProjectWeek,
  getIsoWeek,
  getMondayOfWeek,
  getWeekRange,
  getWeekNumberMonthly,
  getWeekNumberProject,
  parseNotionDate,
  parseWeekPolicy,
  toCalendarDate,
  weekRange,
} from "../utils/dateUtils.js";

const d = (s: string) => {
  const parsed = parseNotionDate(s);
  if (!parsed) throw new Error(`bad fixture ${s}`);
  return parsed;
};

const anchor = d("2025-07-01");
const params = { anchor };

describe("parseNotionDate", () => {
  it("takes the calendar day of a datetime string", () => {
    expect(formatIsoDate(d("2025-08-01T23:30:00.000+09:00"))).toBe("2025-08-01");
  });

  it("returns null for empty, malformed and impossible dates", () => {
    expect(parseNotionDate("")).toBeNull();
    expect(parseNotionDate(null)).toBeNull();
    expect(parseNotionDate("not-a-date")).toBeNull();
    expect(parseNotionDate("2025-02-30")).toBeNull();
    expect(parseNotionDate("2025-7-1")).toBeNull();
  });
});

describe("project policy", () => {
  it("counts continuous weeks from the anchor", () => {
    expect(getWeekNumberProject(d("2025-07-01"), anchor)).toBe(1);
    expect(getWeekNumberProject(d("2025-07-07"), anchor)).toBe(1);
    expect(getWeekNumberProject(d("2025-07-08"), anchor)).toBe(2);
    expect(getWeekNumberProject(d("2025-08-04"), anchor)).toBe(5);
  });

  it("puts dates before the anchor in week 0", () => {
    expect(getWeekNumberProject(d("2025-06-30"), anchor)).toBe(0);
    expect(computeWeekNumber(d("2024-01-01"), "project", params)).toBe(0);
  });

  it("returns week 0 exactly for dates before the anchor", () => {
    for (let i = -20; i <= 20; i++) {
      const date = addDays(anchor, i);
      expect(getWeekNumberProject(date, anchor) === 0).toBe(i < 0);
    }
  });

  it("derives the inclusive range of a week", () => {
    const range = weekRange(1, "project", params);
    expect(range && formatIsoDate(range.start)).toBe("2025-07-01");
    expect(range && formatIsoDate(range.end)).toBe("2025-07-07");

    const week3 = weekRange(3, "project", params);
    expect(week3 && formatRange(week3)).toBe("15/7 ~ 21/7");
  });

  it("has no range for week 0 or for the other policies", () => {
    expect(weekRange(0, "project", params)).toBeUndefined();
    expect(weekRange(2, "monthly", params)).toBeUndefined();
    expect(weekRange(2, "iso", params)).toBeUndefined();
  });

  it("ignores the time of day carried by the anchor", () => {
    // meia-noite local de 1/7 num fuso UTC-3
    const shifted = { anchor: new Date(Date.UTC(2025, 6, 1, 3)) };

    expect(getWeekNumberProject(d("2025-07-01"), shifted.anchor)).toBe(1);
    expect(getWeekNumberProject(d("2025-07-08"), shifted.anchor)).toBe(2);
    expect(getWeekNumberProject(d("2025-06-30"), shifted.anchor)).toBe(0);

    const range = weekRange(1, "project", shifted);
    expect(range && formatIsoDate(range.start)).toBe("2025-07-01");
    expect(range && formatIsoDate(range.end)).toBe("2025-07-07");
  });

  it("computes the current project week from a given day", () => {
    expect(getCurrentProjectWeek(anchor, d("2025-07-15"))).toBe(3);
  });
});

describe("monthly policy", () => {
  // 2025-05-01 é quinta; primeira segunda é dia 5
  it("treats the days before the first Monday as week 1", () => {
    expect(getWeekNumberMonthly(d("2025-05-01"))).toBe(1);
    expect(getWeekNumberMonthly(d("2025-05-04"))).toBe(1);
  });

  it("opens week 2 on the first Monday when the month starts mid-week", () => {
    expect(getWeekNumberMonthly(d("2025-05-05"))).toBe(2);
    expect(getWeekNumberMonthly(d("2025-05-12"))).toBe(3);
    expect(getWeekNumberMonthly(d("2025-05-31"))).toBe(5);
  });

  // 2025-09-01 é segunda
  it("starts at week 1 when the 1st is a Monday", () => {
    expect(getWeekNumberMonthly(d("2025-09-01"))).toBe(1);
    expect(getWeekNumberMonthly(d("2025-09-08"))).toBe(2);
    expect(getWeekNumberMonthly(d("2025-09-30"))).toBe(5);
  });

  it("is always between 1 and 6", () => {
    for (let i = 0; i < 366; i++) {
      const week = getWeekNumberMonthly(addDays(toCalendarDate(2024, 1, 1), i));
      expect(week).toBeGreaterThanOrEqual(1);
      expect(week).toBeLessThanOrEqual(6);
    }
  });
});

describe("iso policy", () => {
  it("follows the ISO 8601 calendar", () => {
    expect(getIsoWeek(d("2025-01-01"))).toEqual({ year: 2025, week: 1 });
    expect(getIsoWeek(d("2024-12-30"))).toEqual({ year: 2025, week: 1 });
    expect(getIsoWeek(d("2025-01-06"))).toEqual({ year: 2025, week: 2 });
    expect(getIsoWeek(d("2021-01-03"))).toEqual({ year: 2020, week: 53 });
  });

  it("keys buckets by week number only, so different ISO years collide", () => {
    expect(computeWeekNumber(d("2025-01-08"), "iso", params)).toBe(2);
    expect(computeWeekNumber(d("2026-01-08"), "iso", params)).toBe(2);
  });
});

describe("parseWeekPolicy", () => {
  it("accepts known policies case-insensitively", () => {
    expect(parseWeekPolicy("ISO")).toBe("iso");
    expect(parseWeekPolicy(" monthly ")).toBe("monthly");
  });

  it("rejects unknown policies", () => {
    expect(() => parseWeekPolicy("weekly")).toThrow(ValidationError);
  });
});

describe("formatting", () => {
  it("formats day/month with the pt-BR weekday", () => {
    expect(formatDisplayDate(d("2025-08-01"))).toBe("1/8 (sex)");
    expect(formatDisplayDate(d("2025-07-01"))).toBe("1/7 (ter)");
  });
});

describe("calendar week", () => {
  it("finds the Monday of the week containing a date", () => {
    expect(formatIsoDate(getMondayOfWeek(d("2025-07-06")))).toBe("2025-06-30");
    expect(formatIsoDate(getMondayOfWeek(d("2025-07-07")))).toBe("2025-07-07");
    expect(formatIsoDate(getMondayOfWeek(d("2025-07-09")))).toBe("2025-07-07");
  });

  it("spans Monday to Sunday across a month boundary", () => {
    expect(formatRange(getWeekRange(d("2025-08-01")))).toBe("28/7 ~ 3/8");
  });
});
