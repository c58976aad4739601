import { describe, expect, it } from "vitest";
import { EmptyAxisError } from "../../src/errors.js";
import { nearest } from "../../src/lib/nearest.js";
import { parseUtcDate, toRelativeHours } from "../../src/lib/time.js";

function utc(value: string): Date {
  const parsed = parseUtcDate(value);
  if (!parsed) throw new Error(`bad fixture date ${value}`);
  return parsed;
}

describe("nearest", () => {
  it("returns exact matches unchanged", () => {
    expect(nearest([0.494, 1.54, 2.65], 1.54)).toBe(1.54);
  });

  it("snaps to the closest axis value", () => {
    expect(nearest([0.494, 1.54, 2.65, 3.82], 3)).toBe(2.65);
    expect(nearest([0.494, 1.54, 2.65, 3.82], -5)).toBe(0.494);
    expect(nearest([0.494, 1.54, 2.65, 3.82], 100)).toBe(3.82);
  });

  it("breaks ties toward the lowest index", () => {
    expect(nearest([1, 3], 2)).toBe(1);
    expect(nearest([5, 1, 3], 2)).toBe(1);
    expect(nearest([10, 20, 10], 15)).toBe(10);
  });

  it("throws EmptyAxisError on an empty axis", () => {
    expect(() => nearest([], 1, "depth")).toThrow(EmptyAxisError);
    expect(() => nearest([], 1, "depth")).toThrow("Cannot resolve nearest value on empty depth");
  });

  it("picks the earlier month for a mid-March date", () => {
    const init = utc("2019-01-01");
    const march = toRelativeHours(utc("2021-03-01"), init);
    const april = toRelativeHours(utc("2021-04-01"), init);
    const target = toRelativeHours(utc("2021-03-15"), init);
    expect(nearest([march, april], target)).toBe(march);
  });
});
