import { EmptyAxisError } from "../errors.js";

/**
 * Returns the axis value closest to `target`. Equidistant candidates resolve
 * to the lowest index.
 */
export function nearest(axis: ArrayLike<number>, target: number, axisName?: string): number {
  if (axis.length === 0) {
    throw new EmptyAxisError(axisName);
  }
  let best = axis[0];
  let bestDistance = Math.abs(best - target);
  for (let idx = 1; idx < axis.length; idx++) {
    const distance = Math.abs(axis[idx] - target);
    if (distance < bestDistance) {
      best = axis[idx];
      bestDistance = distance;
    }
  }
  return best;
}
