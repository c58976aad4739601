import type { CellValue, GridAxis, GriddedDataset, LandMask } from "../types.js";
import { computeStrides, forEachIndex } from "./grid.js";

/** One kilometre of latitude, in degrees. */
export const DEFAULT_REGRID_SPACING = 1 / 111.139;

export type RegridOptions = {
  spacing: number;
  mask: LandMask | null;
};

type Bracket = {
  lower: number;
  upper: number;
  /** Weight of `upper`; `lower` takes the rest. */
  weight: number;
};

/**
 * Evenly spaced values from the first axis value, stopping before the last.
 * An axis with a single value keeps it.
 */
export function regularAxis(values: readonly number[], spacing: number): number[] {
  if (!values.length) return [];
  const min = values[0];
  const max = values[values.length - 1];
  if (max <= min) return [min];
  const count = Math.ceil((max - min) / spacing);
  return Array.from({ length: count }, (_, idx) => min + idx * spacing);
}

function bracket(axis: readonly number[], target: number): Bracket | null {
  if (!axis.length || target < axis[0] || target > axis[axis.length - 1]) return null;
  let upper = 0;
  while (upper < axis.length - 1 && axis[upper] < target) upper++;
  if (axis[upper] === target) return { lower: upper, upper, weight: 0 };
  const lower = upper - 1;
  return { lower, upper, weight: (target - axis[lower]) / (axis[upper] - axis[lower]) };
}

/** Bilinear blend of the four surrounding cells; null when a weighted corner is null. */
function bilinear(read: (row: number, col: number) => CellValue, lat: Bracket, lon: Bracket): CellValue {
  const corners: Array<[number, number, number]> = [
    [lat.lower, lon.lower, (1 - lat.weight) * (1 - lon.weight)],
    [lat.lower, lon.upper, (1 - lat.weight) * lon.weight],
    [lat.upper, lon.lower, lat.weight * (1 - lon.weight)],
    [lat.upper, lon.upper, lat.weight * lon.weight]
  ];
  let total = 0;
  for (const [row, col, weight] of corners) {
    if (weight === 0) continue;
    const value = read(row, col);
    if (value === null) return null;
    total += value * weight;
  }
  return total;
}

/**
 * Replaces nulls with the nearest present value along dimension `dim`,
 * extrapolating past the ends. Equidistant candidates resolve to the lower
 * index. Lines with no values stay null.
 */
export function fillNearest(values: readonly CellValue[], shape: readonly number[], dim: number, axis: readonly number[]): CellValue[] {
  const strides = computeStrides(shape);
  const filled = [...values];
  const lines = shape.map((length, idx) => ({ start: 0, stop: idx === dim ? 0 : length - 1 }));
  forEachIndex(lines, (indices) => {
    const base = indices.reduce((offset, index, idx) => offset + index * strides[idx], 0);
    const present: number[] = [];
    for (let k = 0; k < shape[dim]; k++) {
      if (values[base + k * strides[dim]] !== null) present.push(k);
    }
    if (!present.length || present.length === shape[dim]) return;
    for (let k = 0; k < shape[dim]; k++) {
      const offset = base + k * strides[dim];
      if (values[offset] !== null) continue;
      let best = present[0];
      for (const candidate of present) {
        if (Math.abs(axis[candidate] - axis[k]) < Math.abs(axis[best] - axis[k])) best = candidate;
      }
      filled[offset] = values[base + best * strides[dim]];
    }
  });
  return filled;
}

/** Sea flags for each `[latitude][longitude]` cell; cells outside the mask count as land. */
function seaCells(mask: LandMask, latitudes: readonly number[], longitudes: readonly number[]): boolean[] {
  const sea: boolean[] = [];
  for (const latitude of latitudes) {
    const lat = bracket(mask.latitude, latitude);
    for (const longitude of longitudes) {
      const lon = bracket(mask.longitude, longitude);
      const elevation = lat && lon
        ? bilinear((row, col) => mask.elevation[row * mask.longitude.length + col] ?? null, lat, lon)
        : null;
      sea.push(elevation !== null && elevation < 0);
    }
  }
  return sea;
}

/**
 * Resamples every time and depth slice onto a regular latitude/longitude
 * grid: bilinear interpolation, then nearest fill along longitude and then
 * latitude, then land cells of `mask` set to null.
 */
export function regrid(grid: GriddedDataset, options: RegridOptions): GriddedDataset {
  const [time, depth, latitude, longitude] = grid.axes;
  const targetLatitude: GridAxis = { ...latitude, values: regularAxis(latitude.values, options.spacing) };
  const targetLongitude: GridAxis = { ...longitude, values: regularAxis(longitude.values, options.spacing) };
  const shape: GriddedDataset["shape"] = [
    time.values.length,
    depth.values.length,
    targetLatitude.values.length,
    targetLongitude.values.length
  ];
  const sourceStrides = computeStrides(grid.shape);
  const latBrackets = targetLatitude.values.map((value) => bracket(latitude.values, value));
  const lonBrackets = targetLongitude.values.map((value) => bracket(longitude.values, value));
  const planeSize = shape[2] * shape[3];
  const sea = options.mask ? seaCells(options.mask, targetLatitude.values, targetLongitude.values) : null;

  const variables: Record<string, CellValue[]> = {};
  for (const [name, values] of Object.entries(grid.variables)) {
    const interpolated: CellValue[] = [];
    forEachIndex(shape.map((length) => ({ start: 0, stop: length - 1 })), ([t, d, y, x]) => {
      const lat = latBrackets[y];
      const lon = lonBrackets[x];
      const base = t * sourceStrides[0] + d * sourceStrides[1];
      interpolated.push(lat && lon
        ? bilinear((row, col) => values[base + row * sourceStrides[2] + col * sourceStrides[3]], lat, lon)
        : null);
    });
    const filled = fillNearest(fillNearest(interpolated, shape, 3, targetLongitude.values), shape, 2, targetLatitude.values);
    variables[name] = sea ? filled.map((value, offset) => (sea[offset % planeSize] ? value : null)) : filled;
  }

  return { axes: [time, depth, targetLatitude, targetLongitude], shape, variables };
}
