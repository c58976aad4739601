import { promises as fs } from "node:fs";
import { z } from "zod";
import { CatalogLookupError, InvalidCatalogError } from "../errors.js";
import type { CatalogEntry } from "../types.js";
import { parseUtcDate } from "./time.js";

const REQUIRED_COLUMNS = [
  "parameter",
  "temporal",
  "init_date",
  "nrt_date",
  "opendap_my",
  "opendap_nrt",
  "title",
  "value_min",
  "value_max"
] as const;

const catalogDate = z.string().transform((value, ctx) => {
  const parsed = parseUtcDate(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date '${value}'` });
    return z.NEVER;
  }
  return parsed;
});

const rowSchema = z.object({
  parameter: z.string().min(1),
  temporal: z.string().min(1),
  init_date: catalogDate,
  nrt_date: catalogDate,
  opendap_my: z.string().min(1),
  opendap_nrt: z.string().min(1),
  title: z.string(),
  value_min: z.coerce.number(),
  value_max: z.coerce.number()
});

/** Splits one CSV line, honouring double-quoted fields with "" escapes. */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = "";
  let quoted = false;
  for (let idx = 0; idx < line.length; idx++) {
    const char = line[idx];
    if (quoted) {
      if (char === "\"" && line[idx + 1] === "\"") {
        current += "\"";
        idx++;
      }
      else if (char === "\"") {
        quoted = false;
      }
      else {
        current += char;
      }
      continue;
    }
    if (char === "\"") {
      quoted = true;
    }
    else if (char === ",") {
      fields.push(current.trim());
      current = "";
    }
    else {
      current += char;
    }
  }
  fields.push(current.trim());
  return fields;
}

export function parseCatalogCsv(text: string): CatalogEntry[] {
  const lines = text.split(/\r?\n/);
  const headerIdx = lines.findIndex((line) => line.trim().length > 0);
  if (headerIdx === -1) return [];

  const header = splitCsvLine(lines[headerIdx]);
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new InvalidCatalogError(headerIdx + 1, `missing columns ${missing.join(", ")}`);
  }

  const entries: CatalogEntry[] = [];
  for (let idx = headerIdx + 1; idx < lines.length; idx++) {
    if (!lines[idx].trim()) continue;
    const fields = splitCsvLine(lines[idx]);
    const record: Record<string, string> = {};
    header.forEach((column, columnIdx) => {
      record[column] = fields[columnIdx] ?? "";
    });

    const parsed = rowSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidCatalogError(idx + 1, `${issue.path.join(".")}: ${issue.message}`);
    }
    const row = parsed.data;
    entries.push({
      parameter: row.parameter,
      temporal: row.temporal,
      initDate: row.init_date,
      nrtDate: row.nrt_date,
      opendapMy: row.opendap_my,
      opendapNrt: row.opendap_nrt,
      title: row.title,
      valueMin: row.value_min,
      valueMax: row.value_max
    });
  }
  return entries;
}

export async function loadCatalog(filePath: string): Promise<CatalogEntry[]> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseCatalogCsv(raw);
}

export function selectCatalogEntry(entries: readonly CatalogEntry[], variable: string, temporal: string): CatalogEntry {
  const matches = entries.filter((entry) => entry.parameter === variable && entry.temporal === temporal);
  if (matches.length !== 1) {
    throw new CatalogLookupError(variable, temporal, matches.length);
  }
  return matches[0];
}
