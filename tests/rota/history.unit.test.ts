import { describe, expect, it } from "vitest";
import { historyWindowFor, summarizeHistory } from "../../src/rota/history.js";
import { dayRecord, member, nightRecord, windowOf } from "./helpers.js";

const abe = member({
  name: "abe",
  shiftTypes: ["day", "night"],
  indexGroups: ["day-index-1-2", "night-index-1"],
});
const ben = member({ name: "ben", shiftTypes: ["day", "night"], indexGroups: ["night-index-2"] });

const records = [
  dayRecord("abe", "2026-03-15", 1),
  nightRecord("ben", "2026-03-16", 2),
  dayRecord("abe", "2026-02-14", 3),
  nightRecord("abe", "2026-03-02", 1),
  dayRecord("ben", "2026-01-20", 1),
  dayRecord("zed", "2026-03-07", 2),
];

describe("historyWindowFor", () => {
  it("ends the day before the rotation starts", () => {
    expect(historyWindowFor("2026-03-21", 2)).toEqual({ start: "2026-01-21", end: "2026-03-20" });
  });

  it("clamps month-end starts", () => {
    expect(historyWindowFor("2026-03-31", 1)).toEqual({ start: "2026-02-28", end: "2026-03-30" });
  });
});

describe("buildHistoryWindow", () => {
  const window = windowOf(records, [abe, ben]);

  it("drops records outside the window and for unknown members, and sorts the rest", () => {
    expect(window.records).toEqual([
      dayRecord("abe", "2026-02-14", 3),
      nightRecord("abe", "2026-03-02", 1),
      dayRecord("abe", "2026-03-15", 1),
      nightRecord("ben", "2026-03-16", 2),
    ]);
  });

  it("counts and dates per member and shift type", () => {
    expect(window.count("abe", "day")).toBe(2);
    expect(window.count("abe", "night")).toBe(1);
    expect(window.count("ben", "day")).toBe(0);
    expect(window.lastDate("abe", "day")).toBe("2026-03-15");
    expect(window.lastDate("ben", "night")).toBe("2026-03-16");
    expect(window.lastDate("ben", "day")).toBeUndefined();
  });

  it("reports the latest day index", () => {
    expect(window.latestDayIndex("abe")).toBe(1);
    expect(window.latestDayIndex("ben")).toBeUndefined();
    expect(window.latestDayIndex("zed")).toBeUndefined();
  });
});

describe("summarizeHistory", () => {
  it("summarises members with records, sorted by name", () => {
    expect(summarizeHistory(windowOf(records, [ben, abe]))).toEqual([
      {
        memberName: "abe",
        dayCount: 2,
        nightCount: 1,
        dayIndices: [1, 3],
        nightIndices: [1],
        lastDate: "2026-03-15",
      },
      {
        memberName: "ben",
        dayCount: 0,
        nightCount: 1,
        dayIndices: [],
        nightIndices: [2],
        lastDate: "2026-03-16",
      },
    ]);
  });

  it("is empty for an empty window", () => {
    expect(summarizeHistory(windowOf([], [abe]))).toEqual([]);
  });
});
