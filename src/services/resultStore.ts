import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { gunzip, gzip } from "node:zlib";
import { promisify } from "node:util";
import type { CellValue, GriddedDataset, PipelineResult, SubsetRequest, Vintage } from "../types.js";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export type StoredRow = {
  longitude: number;
  latitude: number;
  depth: number | null;
  time: string;
  values: Record<string, CellValue>;
};

export type StoredResult = {
  parameter: string;
  title: string;
  temporal: string;
  start: string;
  stop: string;
  initDate: string;
  variables: string[];
  routes: Array<{ vintage: Vintage; url: string; start: number; stop: number }>;
  rows: StoredRow[];
  grid?: GriddedDataset;
  writtenAt: string;
};

export function computeRequestHash(request: SubsetRequest): string {
  const hash = createHash("sha1");
  hash.update(request.parameter);
  hash.update("|");
  hash.update(request.temporal);
  hash.update("|");
  hash.update(request.start.toISOString());
  hash.update("|");
  hash.update(request.stop.toISOString());
  hash.update("|");
  hash.update([
    request.bbox.lonMin.toFixed(4),
    request.bbox.lonMax.toFixed(4),
    request.bbox.latMin.toFixed(4),
    request.bbox.latMax.toFixed(4),
    request.depth.min.toFixed(2),
    request.depth.max.toFixed(2)
  ].join(","));
  hash.update("|");
  hash.update(request.layout);
  hash.update("|");
  if (request.regrid) hash.update(request.regrid.spacing.toFixed(6));
  return hash.digest("hex");
}

export function toStoredResult(result: PipelineResult, writtenAt: Date = new Date()): StoredResult {
  const { request, entry, dataset } = result;
  return {
    parameter: dataset.parameter,
    title: entry.title,
    temporal: request.temporal,
    start: request.start.toISOString(),
    stop: request.stop.toISOString(),
    initDate: dataset.initDate.toISOString(),
    variables: dataset.variables,
    routes: result.routes.map((item) => ({ vintage: item.vintage, url: item.url, start: item.bounds.start, stop: item.bounds.stop })),
    rows: dataset.rows.map((row) => ({ ...row, time: row.time.toISOString() })),
    ...(result.grid ? { grid: result.grid } : {}),
    writtenAt: writtenAt.toISOString()
  };
}

export class ResultStore {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  makeFilePath(request: SubsetRequest): string {
    return path.join(this.outputDir, `${request.parameter}_${request.temporal}_${computeRequestHash(request)}.json.gz`);
  }

  async write(result: PipelineResult): Promise<string> {
    const filePath = this.makeFilePath(result.request);
    const payload = JSON.stringify(toStoredResult(result));
    const compressed = await gzipAsync(payload);
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(filePath, compressed);
    return filePath;
  }

  async read(filePath: string): Promise<StoredResult | null> {
    try {
      const compressed = await fs.readFile(filePath);
      const raw = await gunzipAsync(compressed);
      return JSON.parse(raw.toString("utf8")) as StoredResult;
    }
    catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
  }
}
