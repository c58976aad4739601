import type { CellValue, NumericAttributes } from "../types.js";
import type { IndexRange } from "./filters.js";

export function computeStrides(shape: readonly number[]): number[] {
  const strides: number[] = Array(shape.length).fill(1);
  for (let idx = shape.length - 2; idx >= 0; idx--) {
    strides[idx] = strides[idx + 1] * shape[idx + 1];
  }
  return strides;
}

export function rangeLength(range: IndexRange): number {
  return range.stop - range.start + 1;
}

/**
 * Visits every index tuple of the hyperslab in row-major order, passing the
 * tuple and its position within the slab.
 */
export function forEachIndex(ranges: readonly IndexRange[], visit: (indices: number[], position: number) => void): void {
  if (ranges.some((range) => rangeLength(range) <= 0)) return;
  const indices = ranges.map((range) => range.start);
  let position = 0;
  while (true) {
    visit(indices, position);
    position++;
    let dim = indices.length - 1;
    while (dim >= 0) {
      if (indices[dim] < ranges[dim].stop) {
        indices[dim]++;
        break;
      }
      indices[dim] = ranges[dim].start;
      dim--;
    }
    if (dim < 0) return;
  }
}

/** Copies the hyperslab `ranges` out of a row-major array of `shape`. */
export function sliceHyperslab(data: ArrayLike<number>, shape: readonly number[], ranges: readonly IndexRange[]): number[] {
  const strides = computeStrides(shape);
  const out: number[] = [];
  forEachIndex(ranges, (indices) => {
    let offset = 0;
    for (let dim = 0; dim < indices.length; dim++) {
      offset += indices[dim] * strides[dim];
    }
    out.push(data[offset]);
  });
  return out;
}

/** Applies fill-value masking, then `scale_factor` and `add_offset`. */
export function decodeValue(raw: number, attributes: NumericAttributes): CellValue {
  if (!Number.isFinite(raw)) return null;
  for (const fill of [attributes._FillValue, attributes.missing_value]) {
    if (fill === undefined) continue;
    const tolerance = Math.abs(fill) * 1e-6 + 1e-6;
    if (Math.abs(raw - fill) <= tolerance) return null;
  }
  return raw * (attributes.scale_factor ?? 1) + (attributes.add_offset ?? 0);
}
