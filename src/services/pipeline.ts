import type { Logger } from "pino";
import { assemble, toGrid } from "../lib/assemble.js";
import { selectCatalogEntry } from "../lib/catalog.js";
import { augment, expandVariables, getDerivedField } from "../lib/derived.js";
import { buildFilters } from "../lib/filters.js";
import { resolveParameter } from "../lib/parameters.js";
import { regrid } from "../lib/regrid.js";
import { isResampleFrequency, resample, type ResampleFrequency } from "../lib/resample.js";
import { route } from "../lib/router.js";
import { toRelativeHours } from "../lib/time.js";
import type { CatalogEntry, GriddedDataset, LandMask, ParameterSpec, PipelineResult, RowSet, SubsetRequest } from "../types.js";
import type { ArchiveClient } from "./archiveClient.js";
import { fetchSubset } from "./subsetFetcher.js";

/**
 * Everything one run needs, resolved up front. Both archives of a catalog
 * entry are assumed to share its `initDate`; request bounds are converted
 * against that single epoch.
 */
export type PipelineContext = Readonly<{
  request: SubsetRequest;
  parameter: ParameterSpec;
  entry: CatalogEntry;
  fetchVariables: string[];
  outputVariables: string[];
  startTs: number;
  stopTs: number;
  nrtTs: number;
  pointInTime: boolean;
  resampleTo: ResampleFrequency | null;
  landMask: LandMask | null;
  client: ArchiveClient;
  logger: Logger;
}>;

export type PipelineDependencies = {
  request: SubsetRequest;
  catalog: readonly CatalogEntry[];
  client: ArchiveClient;
  logger: Logger;
  /** Elevation grid used to blank land cells when regridding. */
  landMask?: LandMask | null;
};

export function buildPipelineContext({ request, catalog, client, logger, landMask = null }: PipelineDependencies): PipelineContext {
  const parameter = resolveParameter(request.parameter);
  const catalogTemporal = parameter.sourceTemporal ?? request.temporal;
  const entry = selectCatalogEntry(catalog, parameter.variable, catalogTemporal);
  logger.info({ parameter: parameter.name, variable: entry.parameter, temporal: entry.temporal, title: entry.title }, "Selected catalog entry");

  const fetchVariables = expandVariables([parameter.variable]);
  const outputVariables = getDerivedField(parameter.variable)
    ? [...fetchVariables, parameter.variable]
    : fetchVariables;
  const resampleTo = catalogTemporal !== request.temporal && isResampleFrequency(request.temporal)
    ? request.temporal
    : null;

  return Object.freeze({
    request,
    parameter,
    entry,
    fetchVariables,
    outputVariables,
    startTs: toRelativeHours(request.start, entry.initDate),
    stopTs: toRelativeHours(request.stop, entry.initDate),
    nrtTs: toRelativeHours(entry.nrtDate, entry.initDate),
    pointInTime: request.start.getTime() === request.stop.getTime(),
    resampleTo,
    landMask,
    client,
    logger
  });
}

/**
 * Fetches every routed archive in order, then merges. Any archive failure
 * aborts the run; there is no partial result.
 */
export async function runPipeline(context: PipelineContext): Promise<PipelineResult> {
  const { request, parameter, entry, client, logger } = context;
  const routes = route(context.startTs, context.stopTs, context.nrtTs, entry);
  logger.info({ routes: routes.map((item) => ({ vintage: item.vintage, bounds: item.bounds })) }, "Resolved archive routes");

  const rowSets: RowSet[] = [];
  const split = routes.length > 1;
  for (const archive of routes) {
    const excludeStop = split && archive.vintage === "multi-year";
    const filters = buildFilters(request, context.pointInTime, archive.bounds, context.fetchVariables, excludeStop);
    logger.info({ vintage: archive.vintage, url: archive.url }, "Fetching archive subset");
    const rowSet = await fetchSubset(client, {
      url: archive.url,
      vintage: archive.vintage,
      variables: context.fetchVariables,
      filters
    }, logger);
    logger.debug({ vintage: archive.vintage, rowCount: rowSet.rows.length }, "Fetched archive subset");
    rowSets.push({ ...rowSet, rows: augment(rowSet.rows, [parameter.variable]) });
  }

  let dataset = assemble(rowSets, {
    parameter: parameter.name,
    variables: context.outputVariables,
    initDate: entry.initDate
  });

  if (context.resampleTo) {
    logger.info({ parameter: parameter.name, frequency: context.resampleTo }, `Resampling ${parameter.name} to ${context.resampleTo}`);
    dataset = resample(dataset, context.resampleTo);
  }

  logger.info({ rowCount: dataset.rows.length }, "Assembled dataset");

  let grid: GriddedDataset | undefined;
  if (request.layout === "grid") {
    grid = toGrid(dataset);
    if (request.regrid) {
      logger.info({ spacing: request.regrid.spacing, masked: context.landMask !== null }, "Regridding onto a regular grid");
      grid = regrid(grid, { spacing: request.regrid.spacing, mask: context.landMask });
    }
  }

  return {
    request,
    entry,
    routes,
    dataset,
    ...(grid ? { grid } : {})
  };
}
