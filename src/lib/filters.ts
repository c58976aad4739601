import type { AxisFilter, HourBounds, RangeFilter, SubsetFilters, SubsetRequest } from "../types.js";
import { nearest } from "./nearest.js";

export type IndexRange = {
  start: number;
  /** Inclusive. */
  stop: number;
};

export type AxisSelection = {
  range: IndexRange | null;
  accepts: (value: number) => boolean;
};

/** Variables published without a depth dimension (water clarity, wave height). */
export const SURFACE_ONLY_VARIABLES: ReadonlySet<string> = new Set(["ZSD", "VHM0"]);

export function isSurfaceOnly(variables: readonly string[]): boolean {
  return variables.length > 0 && variables.every((variable) => SURFACE_ONLY_VARIABLES.has(variable));
}

export function rangeFilter(lo: number, hi: number): RangeFilter {
  return { kind: "range", lo, hi };
}

export function rangeOrPoint(lo: number, hi: number): AxisFilter {
  return lo === hi ? { kind: "point", target: lo } : rangeFilter(lo, hi);
}

/**
 * Point-or-range mode is decided from the request, never from a route's
 * bounds, so the cutover half of a split range stays a range. With
 * `excludeStop` the time range leaves out its stop instant, which the next
 * archive of a split route reads instead.
 */
export function buildFilters(
  request: Pick<SubsetRequest, "bbox" | "depth">,
  pointInTime: boolean,
  bounds: HourBounds,
  variables: readonly string[],
  excludeStop = false
): SubsetFilters {
  let time: AxisFilter;
  if (pointInTime) {
    time = { kind: "point", target: bounds.start };
  }
  else {
    time = excludeStop
      ? { ...rangeFilter(bounds.start, bounds.stop), hiExclusive: true }
      : rangeFilter(bounds.start, bounds.stop);
  }
  return {
    longitude: rangeFilter(request.bbox.lonMin, request.bbox.lonMax),
    latitude: rangeFilter(request.bbox.latMin, request.bbox.latMax),
    time,
    depth: isSurfaceOnly(variables) ? null : rangeOrPoint(request.depth.min, request.depth.max)
  };
}

export function selectIndices(axis: ArrayLike<number>, filter: AxisFilter, axisName?: string): AxisSelection {
  let accepts: (value: number) => boolean;
  if (filter.kind === "range") {
    const { lo, hi, hiExclusive } = filter;
    accepts = hiExclusive
      ? (value) => value >= lo && value < hi
      : (value) => value >= lo && value <= hi;
  }
  else {
    const snapped = nearest(axis, filter.target, axisName);
    accepts = (value) => value === snapped;
  }

  let start = -1;
  let stop = -1;
  for (let idx = 0; idx < axis.length; idx++) {
    if (!accepts(axis[idx])) continue;
    if (start === -1) start = idx;
    stop = idx;
  }
  return {
    range: start === -1 ? null : { start, stop },
    accepts
  };
}
