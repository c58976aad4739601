import type { AssembledDataset, AssembledRow, CellValue, GridAxis, GriddedDataset, RowSet } from "../types.js";
import { computeStrides } from "./grid.js";
import { toAbsolute, toRelativeHours } from "./time.js";

type AssembleOptions = {
  parameter: string;
  variables: string[];
  initDate: Date;
};

/**
 * Concatenates row sets in fetch order and converts relative hours to UTC
 * timestamps. All row sets must share `initDate`: it is a property of the
 * catalog row, not of each archive URL.
 */
export function assemble(rowSets: readonly RowSet[], options: AssembleOptions): AssembledDataset {
  const rows: AssembledRow[] = [];
  for (const rowSet of rowSets) {
    for (const row of rowSet.rows) {
      rows.push({ ...row, time: toAbsolute(row.time, options.initDate) });
    }
  }
  return {
    parameter: options.parameter,
    variables: [...options.variables],
    initDate: options.initDate,
    rows
  };
}

function uniqueSorted(values: Iterable<number>): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

function indexOf(values: number[]): Map<number, number> {
  return new Map(values.map((value, idx) => [value, idx]));
}

/** Surface-only rows carry no depth; they are placed on a single 0 m level. */
function rowDepth(row: AssembledRow): number {
  return row.depth ?? 0;
}

export function extractGridAxes(dataset: AssembledDataset): GriddedDataset["axes"] {
  const initIso = dataset.initDate.toISOString().replace(".000Z", "Z");
  const time: GridAxis = {
    name: "time",
    unit: `hours since ${initIso}`,
    values: uniqueSorted(dataset.rows.map((row) => toRelativeHours(row.time, dataset.initDate)))
  };
  const depth: GridAxis = { name: "depth", unit: "m", values: uniqueSorted(dataset.rows.map(rowDepth)) };
  const latitude: GridAxis = { name: "latitude", unit: "degrees_north", values: uniqueSorted(dataset.rows.map((row) => row.latitude)) };
  const longitude: GridAxis = { name: "longitude", unit: "degrees_east", values: uniqueSorted(dataset.rows.map((row) => row.longitude)) };
  return [time, depth, latitude, longitude];
}

/** Lays the rows out as `[time][depth][latitude][longitude]` arrays, null where no row exists. */
export function toGrid(dataset: AssembledDataset): GriddedDataset {
  const axes = extractGridAxes(dataset);
  const [time, depth, latitude, longitude] = axes;
  const shape: GriddedDataset["shape"] = [time.values.length, depth.values.length, latitude.values.length, longitude.values.length];
  const strides = computeStrides(shape);
  const size = shape.reduce((total, length) => total * length, 1);
  const lookups = axes.map((axis) => indexOf(axis.values));

  const variables: Record<string, CellValue[]> = {};
  for (const name of dataset.variables) {
    variables[name] = Array<CellValue>(size).fill(null);
  }

  for (const row of dataset.rows) {
    const coordinates = [toRelativeHours(row.time, dataset.initDate), rowDepth(row), row.latitude, row.longitude];
    let offset = 0;
    coordinates.forEach((value, dim) => {
      offset += (lookups[dim].get(value) ?? 0) * strides[dim];
    });
    for (const name of dataset.variables) {
      variables[name][offset] = row.values[name] ?? null;
    }
  }

  return { axes, shape, variables };
}
