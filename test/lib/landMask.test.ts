import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadLandMask, parseLandMask } from "../../src/lib/landMask.js";

describe("land mask", () => {
  it("loads an elevation grid from JSON", async () => {
    const filePath = path.join(mkdtempSync(path.join(tmpdir(), "subset-mask-")), "mask.json");
    writeFileSync(filePath, JSON.stringify({ longitude: [114, 115], latitude: [-9, -8], elevation: [-40, 12, null, -3] }));

    expect(await loadLandMask(filePath)).toEqual({ longitude: [114, 115], latitude: [-9, -8], elevation: [-40, 12, null, -3] });
  });

  it("rejects descending axes and mis-sized elevation", () => {
    expect(() => parseLandMask({ longitude: [115, 114], latitude: [-9], elevation: [1, 2] })).toThrow(ZodError);
    expect(() => parseLandMask({ longitude: [114, 115], latitude: [-9], elevation: [1] })).toThrow(ZodError);
  });
});
