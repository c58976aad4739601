import { existsSync, mkdirSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_REGRID_SPACING } from "./lib/regrid.js";
import { parseUtcDate, startOfUtcDay } from "./lib/time.js";
import type { SubsetRequest } from "./types.js";

const dateInput = z.string().transform((value, ctx) => {
  const parsed = parseUtcDate(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  CATALOG_PATH: z.string().default(path.join(process.cwd(), "sources.csv")),
  OUTPUT_DIR: z.string().default(path.join(process.cwd(), "var", "subsets")),
  PARAMETER: z.string().min(1),
  TEMPORAL: z.string().min(1).default("monthly"),
  START_DATE: dateInput,
  STOP_DATE: dateInput.optional(),
  LON_MIN: z.coerce.number(),
  LON_MAX: z.coerce.number(),
  LAT_MIN: z.coerce.number(),
  LAT_MAX: z.coerce.number(),
  DEPTH_MIN: z.coerce.number().default(0),
  DEPTH_MAX: z.coerce.number().default(0),
  OUTPUT_LAYOUT: z.enum(["rows", "grid"]).default("rows"),
  REGRID: z.enum(["true", "false"]).default("false").transform((value) => value === "true"),
  REGRID_SPACING: z.coerce.number().positive().default(DEFAULT_REGRID_SPACING),
  LAND_MASK_PATH: z.string().min(1).optional(),
  OPENDAP_USERNAME: z.string().optional(),
  OPENDAP_PASSWORD: z.string().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(2 * 60 * 1000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
})
  .refine((env) => env.LON_MIN <= env.LON_MAX, { message: "LON_MIN must not exceed LON_MAX", path: ["LON_MIN"] })
  .refine((env) => env.LAT_MIN <= env.LAT_MAX, { message: "LAT_MIN must not exceed LAT_MAX", path: ["LAT_MIN"] })
  .refine((env) => env.DEPTH_MIN <= env.DEPTH_MAX, { message: "DEPTH_MIN must not exceed DEPTH_MAX", path: ["DEPTH_MIN"] })
  .refine((env) => !env.REGRID || env.OUTPUT_LAYOUT === "grid", { message: "REGRID needs OUTPUT_LAYOUT=grid", path: ["REGRID"] });

export type PipelineConfig = z.infer<typeof envSchema> & {
  request: SubsetRequest;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): PipelineConfig {
  const parsed = envSchema.parse(env);

  if (!existsSync(parsed.OUTPUT_DIR)) {
    mkdirSync(parsed.OUTPUT_DIR, { recursive: true });
  }

  const request: SubsetRequest = {
    parameter: parsed.PARAMETER,
    temporal: parsed.TEMPORAL,
    start: parsed.START_DATE,
    stop: parsed.STOP_DATE ?? startOfUtcDay(now),
    bbox: {
      lonMin: parsed.LON_MIN,
      lonMax: parsed.LON_MAX,
      latMin: parsed.LAT_MIN,
      latMax: parsed.LAT_MAX
    },
    depth: {
      min: parsed.DEPTH_MIN,
      max: parsed.DEPTH_MAX
    },
    layout: parsed.OUTPUT_LAYOUT,
    regrid: parsed.REGRID ? { spacing: parsed.REGRID_SPACING } : null
  };

  return {
    ...parsed,
    request
  };
}
