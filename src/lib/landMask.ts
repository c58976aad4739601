import { promises as fs } from "node:fs";
import { z } from "zod";
import type { LandMask } from "../types.js";

function ascending(values: number[]): boolean {
  return values.every((value, idx) => idx === 0 || value > values[idx - 1]);
}

const landMaskSchema = z.object({
  longitude: z.array(z.number()).min(1),
  latitude: z.array(z.number()).min(1),
  elevation: z.array(z.number().nullable())
})
  .refine((mask) => ascending(mask.longitude), { message: "longitude must be strictly ascending", path: ["longitude"] })
  .refine((mask) => ascending(mask.latitude), { message: "latitude must be strictly ascending", path: ["latitude"] })
  .refine((mask) => mask.elevation.length === mask.latitude.length * mask.longitude.length, {
    message: "elevation must hold one value per latitude and longitude",
    path: ["elevation"]
  });

export function parseLandMask(input: unknown): LandMask {
  return landMaskSchema.parse(input);
}

/** Reads a JSON elevation grid (`longitude`, `latitude`, row-major `elevation`). */
export async function loadLandMask(filePath: string): Promise<LandMask> {
  const raw = await fs.readFile(filePath, "utf8");
  return parseLandMask(JSON.parse(raw));
}
