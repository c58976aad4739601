import { InvalidRangeError } from "../errors.js";
import type { ArchiveRoute, CatalogEntry } from "../types.js";

type RouteUrls = Pick<CatalogEntry, "opendapMy" | "opendapNrt">;

/**
 * Picks the archive(s) covering [startTs, stopTs]. All three values are hour
 * offsets from the same init date. A range straddling the cutover is split at
 * `nrtTs` so the multi-year stop and the near-real-time start coincide.
 */
export function route(startTs: number, stopTs: number, nrtTs: number, urls: RouteUrls): ArchiveRoute[] {
  if (!(startTs <= stopTs)) {
    throw new InvalidRangeError();
  }
  if (stopTs < nrtTs) {
    return [{ vintage: "multi-year", url: urls.opendapMy, bounds: { start: startTs, stop: stopTs } }];
  }
  if (startTs >= nrtTs) {
    return [{ vintage: "near-real-time", url: urls.opendapNrt, bounds: { start: startTs, stop: stopTs } }];
  }
  return [
    { vintage: "multi-year", url: urls.opendapMy, bounds: { start: startTs, stop: nrtTs } },
    { vintage: "near-real-time", url: urls.opendapNrt, bounds: { start: nrtTs, stop: stopTs } }
  ];
}
