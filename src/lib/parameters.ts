import { UnknownParameterError } from "../errors.js";
import type { ParameterSpec } from "../types.js";

const PARAMETERS: Record<string, Omit<ParameterSpec, "name">> = {
  arus: { variable: "sea_water_velocity" },
  sst: { variable: "thetao" },
  salinitas: { variable: "so" },
  klorofil: { variable: "chl" },
  ph: { variable: "ph" },
  gelombang: { variable: "VHM0", sourceTemporal: "3-hourly" },
  kecerahan: { variable: "ZSD" }
};

export function parameterNames(): string[] {
  return Object.keys(PARAMETERS);
}

export function resolveParameter(name: string): ParameterSpec {
  const spec = Object.prototype.hasOwnProperty.call(PARAMETERS, name) ? PARAMETERS[name] : undefined;
  if (!spec) {
    throw new UnknownParameterError(name, parameterNames());
  }
  return {
    name,
    variable: spec.variable,
    ...(spec.sourceTemporal ? { sourceTemporal: spec.sourceTemporal } : {})
  };
}
