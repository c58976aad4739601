import { describe, expect, it } from "vitest";
import { InvalidRangeError } from "../../src/errors.js";
import { route } from "../../src/lib/router.js";
import { toRelativeHours } from "../../src/lib/time.js";

const urls = {
  opendapMy: "https://archive.test/my",
  opendapNrt: "https://archive.test/nrt"
};

describe("route", () => {
  it("uses the multi-year archive when the range ends before the cutover", () => {
    expect(route(0, 100, 200, urls)).toEqual([
      { vintage: "multi-year", url: urls.opendapMy, bounds: { start: 0, stop: 100 } }
    ]);
  });

  it("uses the near-real-time archive when the range starts at or after the cutover", () => {
    expect(route(200, 300, 200, urls)).toEqual([
      { vintage: "near-real-time", url: urls.opendapNrt, bounds: { start: 200, stop: 300 } }
    ]);
    expect(route(250, 250, 200, urls)).toEqual([
      { vintage: "near-real-time", url: urls.opendapNrt, bounds: { start: 250, stop: 250 } }
    ]);
  });

  it("sends a point query on the cutover itself to the near-real-time archive", () => {
    expect(route(200, 200, 200, urls)).toEqual([
      { vintage: "near-real-time", url: urls.opendapNrt, bounds: { start: 200, stop: 200 } }
    ]);
  });

  it("splits a range that straddles the cutover without gap or overlap", () => {
    const routes = route(100, 300, 200, urls);
    expect(routes).toEqual([
      { vintage: "multi-year", url: urls.opendapMy, bounds: { start: 100, stop: 200 } },
      { vintage: "near-real-time", url: urls.opendapNrt, bounds: { start: 200, stop: 300 } }
    ]);
    expect(routes[0].bounds.stop).toBe(routes[1].bounds.start);
  });

  it("splits when the range stops exactly on the cutover", () => {
    expect(route(100, 200, 200, urls).map((item) => item.vintage)).toEqual(["multi-year", "near-real-time"]);
  });

  it("rejects a start after the stop", () => {
    expect(() => route(300, 100, 200, urls)).toThrow(InvalidRangeError);
    expect(() => route(Number.NaN, 100, 200, urls)).toThrow(InvalidRangeError);
  });

  it("covers every ordered range with exactly one branch", () => {
    for (let nrt = 0; nrt <= 4; nrt++) {
      for (let start = 0; start <= 4; start++) {
        for (let stop = start; stop <= 4; stop++) {
          const routes = route(start, stop, nrt, urls);
          expect(routes.length).toBeGreaterThanOrEqual(1);
          expect(routes.length).toBeLessThanOrEqual(2);
          expect(routes[0].bounds.start).toBe(start);
          expect(routes[routes.length - 1].bounds.stop).toBe(stop);
        }
      }
    }
  });

  it("splits a 2021-2023 request at the June 2022 cutover", () => {
    const init = new Date("2019-01-01T00:00:00.000Z");
    const start = toRelativeHours(new Date("2021-01-01T00:00:00.000Z"), init);
    const stop = toRelativeHours(new Date("2023-01-01T00:00:00.000Z"), init);
    const nrt = toRelativeHours(new Date("2022-06-01T00:00:00.000Z"), init);

    const routes = route(start, stop, nrt, urls);
    expect(routes).toHaveLength(2);
    expect(routes[0].url).toBe(urls.opendapMy);
    expect(routes[0].bounds.stop).toBe(29928);
    expect(routes[1].url).toBe(urls.opendapNrt);
    expect(routes[1].bounds.start).toBe(29928);
  });
});
