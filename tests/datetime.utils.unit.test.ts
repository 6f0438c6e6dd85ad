import { describe, expect, it } from "vitest";
import {
  addDays,
  addMonths,
  compareDays,
  daysBetween,
  generateDays,
  isMonday,
  isWeekend,
  isWithinRange,
} from "../src/datetime.utils.js";

describe("addDays", () => {
  it("crosses month and year boundaries", () => {
    expect(addDays("2026-03-29", 6)).toBe("2026-04-04");
    expect(addDays("2025-12-30", 3)).toBe("2026-01-02");
  });

  it("accepts negative offsets", () => {
    expect(addDays("2026-03-21", -1)).toBe("2026-03-20");
  });
});

describe("addMonths", () => {
  it("keeps the day of month when it exists", () => {
    expect(addMonths("2026-03-21", 2)).toBe("2026-05-21");
    expect(addMonths("2026-03-21", -2)).toBe("2026-01-21");
  });

  it("clamps to the last day of shorter months", () => {
    expect(addMonths("2025-12-31", 2)).toBe("2026-02-28");
    expect(addMonths("2024-03-31", -1)).toBe("2024-02-29");
  });

  it("rolls over years in both directions", () => {
    expect(addMonths("2026-11-21", 2)).toBe("2027-01-21");
    expect(addMonths("2026-01-15", -2)).toBe("2025-11-15");
  });
});

describe("daysBetween", () => {
  it("counts whole days, negative when going backwards", () => {
    expect(daysBetween("2026-03-22", "2026-03-29")).toBe(7);
    expect(daysBetween("2026-03-29", "2026-03-22")).toBe(-7);
    expect(daysBetween("2026-03-21", "2026-03-21")).toBe(0);
  });
});

describe("day-of-week helpers", () => {
  it("identifies weekends and Mondays", () => {
    expect(isWeekend("2026-03-21")).toBe(true);
    expect(isWeekend("2026-03-22")).toBe(true);
    expect(isWeekend("2026-03-23")).toBe(false);
    expect(isMonday("2026-03-23")).toBe(true);
    expect(isMonday("2026-03-24")).toBe(false);
  });
});

describe("ranges", () => {
  it("generates an inclusive list of days", () => {
    expect(generateDays({ start: "2026-03-30", end: "2026-04-02" })).toEqual([
      "2026-03-30",
      "2026-03-31",
      "2026-04-01",
      "2026-04-02",
    ]);
  });

  it("returns an empty list when start is after end", () => {
    expect(generateDays({ start: "2026-04-02", end: "2026-04-01" })).toEqual([]);
  });

  it("checks inclusive membership", () => {
    const range = { start: "2026-03-23", end: "2026-03-29" };
    expect(isWithinRange("2026-03-23", range)).toBe(true);
    expect(isWithinRange("2026-03-29", range)).toBe(true);
    expect(isWithinRange("2026-03-30", range)).toBe(false);
  });

  it("orders day strings", () => {
    expect(["2026-04-01", "2026-03-31", "2026-04-01"].toSorted(compareDays)).toEqual([
      "2026-03-31",
      "2026-04-01",
      "2026-04-01",
    ]);
  });
});
