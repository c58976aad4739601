export type BoundingBox = {
  lonMin: number;
  lonMax: number;
  latMin: number;
  latMax: number;
};

export type DepthRange = {
  min: number;
  max: number;
};

export type OutputLayout = "rows" | "grid";

export type RegridSettings = {
  /** Target spacing in degrees for both horizontal axes. */
  spacing: number;
};

export type SubsetRequest = {
  parameter: string;
  temporal: string;
  start: Date;
  stop: Date;
  bbox: BoundingBox;
  depth: DepthRange;
  layout: OutputLayout;
  /** Resample the grid layout onto a regular horizontal grid; null keeps the archive grid. */
  regrid: RegridSettings | null;
};

export type CatalogEntry = {
  parameter: string;
  temporal: string;
  initDate: Date;
  nrtDate: Date;
  opendapMy: string;
  opendapNrt: string;
  title: string;
  valueMin: number;
  valueMax: number;
};

export type ParameterSpec = {
  name: string;
  /** Archive variable, or a derived field computed from archive variables. */
  variable: string;
  /** Catalog resolution the archive is published at, when it differs from the request. */
  sourceTemporal?: string;
};

export type Vintage = "multi-year" | "near-real-time";

export type HourBounds = {
  start: number;
  stop: number;
};

export type ArchiveRoute = {
  vintage: Vintage;
  url: string;
  bounds: HourBounds;
};

export type RangeFilter = {
  kind: "range";
  lo: number;
  hi: number;
  /** Excludes `hi` itself; set on the multi-year half of a split route. */
  hiExclusive?: boolean;
};

export type PointFilter = {
  kind: "point";
  target: number;
};

export type AxisFilter = RangeFilter | PointFilter;

export type DimensionRole = "longitude" | "latitude" | "time" | "depth";

export type SubsetFilters = {
  longitude: RangeFilter;
  latitude: RangeFilter;
  time: AxisFilter;
  /** Absent for surface-only variables. */
  depth: AxisFilter | null;
};

export type NumericAttributes = Partial<Record<"_FillValue" | "missing_value" | "scale_factor" | "add_offset", number>>;

export type ArchiveVariable = {
  name: string;
  dimensions: string[];
  attributes: NumericAttributes;
};

export type ArchiveSchema = {
  variables: Record<string, ArchiveVariable>;
};

export type CellValue = number | null;

export type FetchedRow = {
  longitude: number;
  latitude: number;
  depth: number | null;
  /** Hours since the catalog entry's init date. */
  time: number;
  values: Record<string, CellValue>;
};

export type RowSet = {
  vintage: Vintage;
  url: string;
  variables: string[];
  rows: FetchedRow[];
};

export type AssembledRow = Omit<FetchedRow, "time"> & {
  time: Date;
};

export type AssembledDataset = {
  parameter: string;
  variables: string[];
  initDate: Date;
  rows: AssembledRow[];
};

export type GridAxis = {
  name: DimensionRole;
  unit: string;
  values: number[];
};

export type GriddedDataset = {
  /** Ordered time, depth, latitude, longitude. */
  axes: [GridAxis, GridAxis, GridAxis, GridAxis];
  shape: [number, number, number, number];
  variables: Record<string, CellValue[]>;
};

export type LandMask = {
  /** Ascending. */
  longitude: number[];
  /** Ascending. */
  latitude: number[];
  /** Row-major `[latitude][longitude]` elevation in metres; negative is sea. */
  elevation: CellValue[];
};

export type PipelineResult = {
  request: SubsetRequest;
  entry: CatalogEntry;
  routes: ArchiveRoute[];
  dataset: AssembledDataset;
  grid?: GriddedDataset;
};
