import { describe, expect, it } from "vitest";
import { parseUtcDate, startOfUtcDay, toAbsolute, toRelativeHours } from "../../src/lib/time.js";

const init = new Date("2019-01-01T00:00:00.000Z");

describe("time normalization", () => {
  it("parses date-only and zone-less timestamps as UTC", () => {
    expect(parseUtcDate("2021-03-15")?.toISOString()).toBe("2021-03-15T00:00:00.000Z");
    expect(parseUtcDate("2022-06-01 12:00:00")?.toISOString()).toBe("2022-06-01T12:00:00.000Z");
    expect(parseUtcDate("2022-06-01T12:00:00+07:00")?.toISOString()).toBe("2022-06-01T05:00:00.000Z");
  });

  it("returns null for unparseable input", () => {
    expect(parseUtcDate("")).toBeNull();
    expect(parseUtcDate("not-a-date")).toBeNull();
  });

  it("expresses dates as hours since the init date", () => {
    expect(toRelativeHours(new Date("2019-01-02T00:00:00.000Z"), init)).toBe(24);
    expect(toRelativeHours(new Date("2022-06-01T00:00:00.000Z"), init)).toBe(1247 * 24);
    expect(toRelativeHours(new Date("2018-12-31T21:00:00.000Z"), init)).toBe(-3);
  });

  it("converts hour offsets back to UTC timestamps", () => {
    expect(toAbsolute(29928, init).toISOString()).toBe("2022-06-01T00:00:00.000Z");
    expect(toAbsolute(1.5, init).toISOString()).toBe("2019-01-01T01:30:00.000Z");
  });

  it("round-trips hour-granular dates", () => {
    const dates = ["2019-01-01T00:00:00.000Z", "2020-02-29T13:00:00.000Z", "2023-10-05T23:00:00.000Z", "2016-07-04T03:00:00.000Z"];
    for (const iso of dates) {
      const date = new Date(iso);
      expect(toAbsolute(toRelativeHours(date, init), init).toISOString()).toBe(iso);
    }
  });

  it("truncates to UTC days", () => {
    const date = new Date("2024-05-06T18:45:00.000Z");
    expect(startOfUtcDay(date).toISOString()).toBe("2024-05-06T00:00:00.000Z");
  });
});
