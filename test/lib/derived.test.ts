import { describe, expect, it } from "vitest";
import { augment, expandVariables, getDerivedField, registerDerivedField } from "../../src/lib/derived.js";
import type { FetchedRow } from "../../src/types.js";

function row(values: FetchedRow["values"]): FetchedRow {
  return { longitude: 115, latitude: -8, depth: 0.494, time: 0, values };
}

describe("derived fields", () => {
  it("expands composite variables into their raw components", () => {
    expect(expandVariables(["sea_water_velocity"])).toEqual(["uo", "vo"]);
    expect(expandVariables(["uo", "sea_water_velocity"])).toEqual(["uo", "vo"]);
    expect(expandVariables(["thetao"])).toEqual(["thetao"]);
  });

  it("computes current speed from orthogonal components", () => {
    const [augmented] = augment([row({ uo: 3, vo: 4 })], ["sea_water_velocity"]);
    expect(augmented.values).toEqual({ uo: 3, vo: 4, sea_water_velocity: 5 });
  });

  it("yields null when a component is missing", () => {
    const [augmented] = augment([row({ uo: 3, vo: null })], ["sea_water_velocity"]);
    expect(augmented.values.sea_water_velocity).toBeNull();
  });

  it("leaves rows untouched when nothing is derived", () => {
    const rows = [row({ thetao: 28.5 })];
    expect(augment(rows, ["thetao"])).toBe(rows);
  });

  it("accepts additional derivations", () => {
    registerDerivedField("wind_stress_ratio", { components: ["a", "b"], compute: ([a, b]) => a / b });
    expect(getDerivedField("wind_stress_ratio")?.components).toEqual(["a", "b"]);
    expect(expandVariables(["wind_stress_ratio"])).toEqual(["a", "b"]);
    const [augmented] = augment([row({ a: 6, b: 3 })], ["wind_stress_ratio"]);
    expect(augmented.values.wind_stress_ratio).toBe(2);
  });
});
