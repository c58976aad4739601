import type { CellValue, FetchedRow } from "../types.js";

export type DerivedField = {
  components: readonly string[];
  compute: (values: readonly number[]) => number;
};

function magnitude(values: readonly number[]): number {
  return Math.hypot(...values);
}

const registry = new Map<string, DerivedField>([
  ["sea_water_velocity", { components: ["uo", "vo"], compute: magnitude }]
]);

export function registerDerivedField(name: string, field: DerivedField): void {
  registry.set(name, field);
}

export function getDerivedField(name: string): DerivedField | undefined {
  return registry.get(name);
}

/** Raw archive variables needed to produce `requested`, composites replaced by their components. */
export function expandVariables(requested: readonly string[]): string[] {
  const expanded: string[] = [];
  for (const name of requested) {
    const field = registry.get(name);
    for (const raw of field ? field.components : [name]) {
      if (!expanded.includes(raw)) expanded.push(raw);
    }
  }
  return expanded;
}

/**
 * Appends a column for every requested composite variable. A cell is null when
 * any of its components is missing.
 */
export function augment<T extends Pick<FetchedRow, "values">>(rows: T[], requested: readonly string[]): T[] {
  const derivations = requested.flatMap((name) => {
    const field = registry.get(name);
    return field ? [{ name, field }] : [];
  });
  if (!derivations.length) return rows;

  return rows.map((row) => {
    const values: Record<string, CellValue> = { ...row.values };
    for (const { name, field } of derivations) {
      const inputs: number[] = [];
      for (const component of field.components) {
        const value = row.values[component];
        if (typeof value !== "number") break;
        inputs.push(value);
      }
      values[name] = inputs.length === field.components.length ? field.compute(inputs) : null;
    }
    return { ...row, values };
  });
}
