import type { Logger } from "pino";
import { RemoteAccessError, VariableNotFoundError } from "../errors.js";
import { selectIndices, type AxisSelection, type IndexRange } from "../lib/filters.js";
import { decodeValue, forEachIndex } from "../lib/grid.js";
import type { CellValue, DimensionRole, FetchedRow, RowSet, SubsetFilters, Vintage } from "../types.js";
import type { ArchiveClient } from "./archiveClient.js";

export type SubsetQuery = {
  url: string;
  vintage: Vintage;
  /** Raw archive variables; composites must already be expanded. */
  variables: string[];
  filters: SubsetFilters;
};

const DIMENSION_ALIASES: Record<DimensionRole, readonly string[]> = {
  longitude: ["longitude", "lon"],
  latitude: ["latitude", "lat"],
  time: ["time", "time_counter"],
  depth: ["depth", "deptht", "depthu", "depthv", "lev"]
};

const ROLES: readonly DimensionRole[] = ["longitude", "latitude", "time", "depth"];
const REQUIRED_ROLES: readonly DimensionRole[] = ["longitude", "latitude", "time"];

export function dimensionRole(name: string): DimensionRole | null {
  const lowered = name.toLowerCase();
  return ROLES.find((role) => DIMENSION_ALIASES[role].includes(lowered)) ?? null;
}

type ResolvedDimension = {
  name: string;
  role: DimensionRole | null;
  axis: number[];
  selection: AxisSelection;
};

function sameDimensions(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, idx) => name === b[idx]);
}

/**
 * Opens one archive, resolves each dimension's filter against its axis and
 * materializes the selected hyperslab as rows. Cells where every requested
 * variable is missing are dropped.
 */
export async function fetchSubset(client: ArchiveClient, query: SubsetQuery, logger: Logger): Promise<RowSet> {
  const { url, variables, filters } = query;
  const schema = await client.describe(url);

  for (const variable of variables) {
    if (!schema.variables[variable]) {
      throw new VariableNotFoundError(variable, url);
    }
  }

  const dimensionNames = schema.variables[variables[0]].dimensions;
  for (const variable of variables.slice(1)) {
    if (!sameDimensions(dimensionNames, schema.variables[variable].dimensions)) {
      throw new RemoteAccessError(url, `Variables ${variables[0]} and ${variable} do not share dimensions`);
    }
  }

  const roles = dimensionNames.map(dimensionRole);
  for (const role of REQUIRED_ROLES) {
    if (!roles.includes(role)) {
      throw new RemoteAccessError(url, `Variable ${variables[0]} has no ${role} dimension`);
    }
  }

  if (!filters.depth) {
    logger.warn({ variables }, `Depth dimension query is not used in ${variables[0]}`);
  }

  const dimensions: ResolvedDimension[] = [];
  for (const [idx, name] of dimensionNames.entries()) {
    const role = roles[idx];
    const axis = await client.readAxis(url, name);
    const filter = role ? filters[role] : null;
    const selection: AxisSelection = filter
      ? selectIndices(axis, filter, name)
      : { range: axis.length ? { start: 0, stop: axis.length - 1 } : null, accepts: () => true };
    dimensions.push({ name, role, axis, selection });
  }

  const base = { vintage: query.vintage, url, variables: [...variables] };
  const ranges: IndexRange[] = [];
  for (const dimension of dimensions) {
    if (!dimension.selection.range) {
      logger.debug({ url, dimension: dimension.name }, "Selection is empty; skipping data read");
      return { ...base, rows: [] };
    }
    ranges.push(dimension.selection.range);
  }

  const decoded: Record<string, CellValue[]> = {};
  for (const variable of variables) {
    const raw = await client.readVariable(url, variable, ranges);
    const attributes = schema.variables[variable].attributes;
    decoded[variable] = raw.map((value) => decodeValue(value, attributes));
  }

  const rows: FetchedRow[] = [];
  forEachIndex(ranges, (indices, position) => {
    const coordinates: Partial<Record<DimensionRole, number>> = {};
    for (let dim = 0; dim < dimensions.length; dim++) {
      const { role, axis, selection } = dimensions[dim];
      const value = axis[indices[dim]];
      if (!selection.accepts(value)) return;
      if (role) coordinates[role] = value;
    }

    const values: Record<string, CellValue> = {};
    let present = false;
    for (const variable of variables) {
      const value = decoded[variable][position];
      values[variable] = value;
      if (value !== null) present = true;
    }
    if (!present) return;

    rows.push({
      longitude: coordinates.longitude ?? Number.NaN,
      latitude: coordinates.latitude ?? Number.NaN,
      depth: coordinates.depth ?? null,
      time: coordinates.time ?? Number.NaN,
      values
    });
  });

  return { ...base, rows };
}
