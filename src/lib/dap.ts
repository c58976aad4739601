import type { ArchiveSchema, NumericAttributes } from "../types.js";

/*
 * Text parsers for the DAP2 documents an OPeNDAP server returns:
 * `.dds` (structure), `.das` (attributes) and `.ascii` (values).
 */

const DECLARATION = /^\s*(Byte|Int8|UInt8|Int16|UInt16|Int32|UInt32|Int64|UInt64|Float32|Float64|String|Url)\s+([\w.-]+)\s*((?:\[[^\]]*\])*)\s*;/i;
const DIMENSION = /\[\s*(?:([\w.-]+)\s*=\s*)?(\d+)\s*\]/g;
const CONTAINER_OPEN = /^\s*([\w.-]+)\s*\{\s*$/;
const CONTAINER_CLOSE = /^\s*\}/;
const ATTRIBUTE = /^\s*(\w+)\s+([\w.-]+)\s+(.*?)\s*;\s*$/;
const ASCII_HEADER = /^([A-Za-z_][\w.-]*)((?:\[\d+\])+)\s*$/;
const ASCII_INDEX_PREFIX = /^(?:\[\d+\])+\s*,?/;
const SEPARATOR = /^-{10,}\s*$/;

const NUMERIC_ATTRIBUTES: ReadonlySet<string> = new Set(["_FillValue", "missing_value", "scale_factor", "add_offset"]);

function isNumericAttribute(name: string): name is keyof NumericAttributes {
  return NUMERIC_ATTRIBUTES.has(name);
}

export type DdsVariable = {
  name: string;
  dimensions: Array<{ name: string; size: number }>;
};

export function parseDds(text: string): DdsVariable[] {
  const seen = new Map<string, DdsVariable>();
  for (const line of text.split(/\r?\n/)) {
    const match = DECLARATION.exec(line);
    if (!match) continue;
    const name = match[2];
    if (seen.has(name)) continue;
    const dimensions: DdsVariable["dimensions"] = [];
    for (const dim of match[3].matchAll(DIMENSION)) {
      dimensions.push({ name: dim[1] ?? `dim${dimensions.length}`, size: Number(dim[2]) });
    }
    seen.set(name, { name, dimensions });
  }
  return [...seen.values()];
}

export function parseDas(text: string): Record<string, NumericAttributes> {
  const attributes: Record<string, NumericAttributes> = {};
  const stack: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const open = CONTAINER_OPEN.exec(line);
    if (open) {
      stack.push(open[1]);
      continue;
    }
    if (CONTAINER_CLOSE.test(line)) {
      stack.pop();
      continue;
    }
    const attribute = ATTRIBUTE.exec(line);
    if (!attribute || stack.length === 0) continue;
    const [, type, name, rawValue] = attribute;
    if (type.toLowerCase() === "string" || !isNumericAttribute(name)) continue;
    const value = Number(rawValue.split(",")[0].trim());
    if (!Number.isFinite(value)) continue;
    const owner = stack[stack.length - 1];
    const owned = attributes[owner] ?? {};
    owned[name] = value;
    attributes[owner] = owned;
  }
  return attributes;
}

export function buildSchema(ddsText: string, dasText: string): ArchiveSchema {
  const attributes = parseDas(dasText);
  const schema: ArchiveSchema = { variables: {} };
  for (const variable of parseDds(ddsText)) {
    schema.variables[variable.name] = {
      name: variable.name,
      dimensions: variable.dimensions.map((dimension) => dimension.name),
      attributes: attributes[variable.name] ?? {}
    };
  }
  return schema;
}

export type AsciiBlock = {
  name: string;
  shape: number[];
  values: number[];
};

export function parseAscii(text: string): AsciiBlock[] {
  const lines = text.split(/\r?\n/);
  const separatorIdx = lines.findIndex((line) => SEPARATOR.test(line));
  const blocks: AsciiBlock[] = [];
  let current: AsciiBlock | null = null;

  for (const line of lines.slice(separatorIdx + 1)) {
    const trimmed = line.trim();
    if (!trimmed) {
      current = null;
      continue;
    }
    const header = ASCII_HEADER.exec(trimmed);
    if (header) {
      const shape = [...header[2].matchAll(/\[(\d+)\]/g)].map((dim) => Number(dim[1]));
      current = { name: header[1], shape, values: [] };
      blocks.push(current);
      continue;
    }
    if (!current) continue;
    const data = trimmed.replace(ASCII_INDEX_PREFIX, "");
    for (const token of data.split(",")) {
      const value = token.trim();
      if (value) current.values.push(Number.parseFloat(value));
    }
  }
  return blocks;
}

/** Finds a block by full name, or by its last dotted segment (`uo.time` for `time`). */
export function findAsciiBlock(blocks: readonly AsciiBlock[], name: string): AsciiBlock | undefined {
  return blocks.find((block) => block.name === name)
    ?? blocks.find((block) => block.name.split(".").pop() === name);
}
