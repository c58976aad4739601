import { promises as fs } from "node:fs";
import { createRequire } from "node:module";
import { fileURLToPath } from "node:url";
import { RemoteAccessError, VariableNotFoundError } from "../errors.js";
import type { IndexRange } from "../lib/filters.js";
import { sliceHyperslab } from "../lib/grid.js";
import type { ArchiveSchema, NumericAttributes } from "../types.js";
import type { ArchiveClient } from "./archiveClient.js";

type NetcdfAttribute = { name: string; type: string; value: number | number[] | string };

type NetcdfVariable = {
  name: string;
  dimensions: number[];
  attributes: NetcdfAttribute[];
  type: string;
};

type NetcdfReader = {
  dimensions: Array<{ name: string; size: number }>;
  recordDimension: { length: number; id?: number };
  variables: NetcdfVariable[];
  getDataVariable(name: string): ArrayLike<number>;
};

const require = createRequire(import.meta.url);

function openReader(bytes: Uint8Array): NetcdfReader {
  // netcdfjs ships CommonJS; NetCDFReader is a named export
  const { NetCDFReader } = require("netcdfjs") as { NetCDFReader: new (data: Uint8Array) => NetcdfReader };
  return new NetCDFReader(bytes);
}

function toPath(url: string): string {
  return url.startsWith("file:") ? fileURLToPath(url) : url;
}

function numericAttributes(variable: NetcdfVariable): NumericAttributes {
  const attributes: NumericAttributes = {};
  for (const attribute of variable.attributes) {
    const { name } = attribute;
    if (name !== "_FillValue" && name !== "missing_value" && name !== "scale_factor" && name !== "add_offset") continue;
    const value = Array.isArray(attribute.value) ? attribute.value[0] : attribute.value;
    const numeric = Number(value);
    if (Number.isFinite(numeric)) attributes[name] = numeric;
  }
  return attributes;
}

/** Archive client over NetCDF classic files on local disk. */
export class NetcdfFileClient implements ArchiveClient {
  private readonly readers = new Map<string, Promise<NetcdfReader>>();

  private open(url: string): Promise<NetcdfReader> {
    const cached = this.readers.get(url);
    if (cached) return cached;
    const pending = fs.readFile(toPath(url))
      .then((bytes) => openReader(bytes))
      .catch((err: unknown) => {
        this.readers.delete(url);
        const reason = err instanceof Error ? err.message : String(err);
        throw new RemoteAccessError(url, `Cannot open NetCDF archive: ${reason}`, { cause: err });
      });
    this.readers.set(url, pending);
    return pending;
  }

  private dimensionSizes(reader: NetcdfReader, variable: NetcdfVariable): number[] {
    return variable.dimensions.map((id) => {
      const size = reader.dimensions[id].size;
      return size === 0 && id === reader.recordDimension.id ? reader.recordDimension.length : size;
    });
  }

  private findVariable(reader: NetcdfReader, url: string, name: string): NetcdfVariable {
    const variable = reader.variables.find((candidate) => candidate.name === name);
    if (!variable) {
      throw new VariableNotFoundError(name, url);
    }
    return variable;
  }

  async describe(url: string): Promise<ArchiveSchema> {
    const reader = await this.open(url);
    const schema: ArchiveSchema = { variables: {} };
    for (const variable of reader.variables) {
      schema.variables[variable.name] = {
        name: variable.name,
        dimensions: variable.dimensions.map((id) => reader.dimensions[id].name),
        attributes: numericAttributes(variable)
      };
    }
    return schema;
  }

  async readAxis(url: string, name: string): Promise<number[]> {
    const reader = await this.open(url);
    this.findVariable(reader, url, name);
    return Array.from(reader.getDataVariable(name), Number);
  }

  async readVariable(url: string, name: string, ranges: IndexRange[]): Promise<number[]> {
    const reader = await this.open(url);
    const variable = this.findVariable(reader, url, name);
    const data = reader.getDataVariable(name);
    return sliceHyperslab(data, this.dimensionSizes(reader, variable), ranges);
  }
}
