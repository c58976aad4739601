import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { computeRequestHash, ResultStore, toStoredResult } from "../../src/services/resultStore.js";
import type { PipelineResult, SubsetRequest } from "../../src/types.js";

const request: SubsetRequest = {
  parameter: "sst",
  temporal: "monthly",
  start: new Date("2021-01-01T00:00:00.000Z"),
  stop: new Date("2021-02-01T00:00:00.000Z"),
  bbox: { lonMin: 114.35, lonMax: 116, latMin: -8.35, latMax: -7 },
  depth: { min: 0, max: 0 },
  layout: "rows",
  regrid: null
};

const result: PipelineResult = {
  request,
  entry: {
    parameter: "thetao",
    temporal: "monthly",
    initDate: new Date("1950-01-01T00:00:00.000Z"),
    nrtDate: new Date("2021-07-01T00:00:00.000Z"),
    opendapMy: "https://archive.test/thetao_my",
    opendapNrt: "https://archive.test/thetao_nrt",
    title: "Sea Surface Temperature (°C)",
    valueMin: 25,
    valueMax: 32
  },
  routes: [{ vintage: "multi-year", url: "https://archive.test/thetao_my", bounds: { start: 622368, stop: 623112 } }],
  dataset: {
    parameter: "sst",
    variables: ["thetao"],
    initDate: new Date("1950-01-01T00:00:00.000Z"),
    rows: [
      { longitude: 115, latitude: -8, depth: 0.494, time: new Date("2021-01-01T00:00:00.000Z"), values: { thetao: 28.5 } }
    ]
  }
};

describe("computeRequestHash", () => {
  it("is stable for equal requests and changes with the bounding box", () => {
    expect(computeRequestHash({ ...request })).toBe(computeRequestHash(request));
    expect(computeRequestHash({ ...request, bbox: { ...request.bbox, lonMax: 116.5 } })).not.toBe(computeRequestHash(request));
    expect(computeRequestHash({ ...request, regrid: { spacing: 0.25 } })).not.toBe(computeRequestHash(request));
  });
});

describe("toStoredResult", () => {
  it("serializes dates as ISO strings", () => {
    const stored = toStoredResult(result, new Date("2024-05-06T00:00:00.000Z"));
    expect(stored).toEqual({
      parameter: "sst",
      title: "Sea Surface Temperature (°C)",
      temporal: "monthly",
      start: "2021-01-01T00:00:00.000Z",
      stop: "2021-02-01T00:00:00.000Z",
      initDate: "1950-01-01T00:00:00.000Z",
      variables: ["thetao"],
      routes: [{ vintage: "multi-year", url: "https://archive.test/thetao_my", start: 622368, stop: 623112 }],
      rows: [{ longitude: 115, latitude: -8, depth: 0.494, time: "2021-01-01T00:00:00.000Z", values: { thetao: 28.5 } }],
      writtenAt: "2024-05-06T00:00:00.000Z"
    });
  });
});

describe("ResultStore", () => {
  it("writes gzip JSON named after the request and reads it back", async () => {
    const outputDir = path.join(mkdtempSync(path.join(tmpdir(), "subset-store-")), "nested");
    const store = new ResultStore(outputDir);

    const filePath = await store.write(result);

    expect(path.dirname(filePath)).toBe(outputDir);
    expect(path.basename(filePath)).toBe(`sst_monthly_${computeRequestHash(request)}.json.gz`);
    const stored = await store.read(filePath);
    expect(stored?.rows).toEqual([{ longitude: 115, latitude: -8, depth: 0.494, time: "2021-01-01T00:00:00.000Z", values: { thetao: 28.5 } }]);
    expect(stored?.grid).toBeUndefined();
  });

  it("returns null for a missing file", async () => {
    const store = new ResultStore(tmpdir());
    expect(await store.read(path.join(tmpdir(), "missing-subset.json.gz"))).toBeNull();
  });
});
