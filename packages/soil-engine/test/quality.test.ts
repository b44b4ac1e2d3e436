import { describe, expect, it } from "vitest";
import type { QualityInput } from "../src/engine/quality.js";
import { gradeDataQuality } from "../src/engine/quality.js";
import { compareQuality } from "../src/schema.js";

const everything: QualityInput = {
  weatherOk: true,
  atmosphericOk: true,
  soilOk: true,
  environmentValid: true,
  temperatureValid: true,
  compositionValid: true
};

describe("gradeDataQuality", () => {
  it("is Insufficient when no source responded", () => {
    expect(
      gradeDataQuality({ ...everything, weatherOk: false, atmosphericOk: false, soilOk: false })
    ).toBe("Insufficient");
  });

  it("is High with every source and valid fields", () => {
    expect(gradeDataQuality(everything)).toBe("High");
  });

  it("is Medium when a source is missing but temperature and texture are valid", () => {
    expect(gradeDataQuality({ ...everything, weatherOk: false })).toBe("Medium");
    expect(gradeDataQuality({ ...everything, environmentValid: false })).toBe("Medium");
  });

  it("is Low when temperature or texture is unusable", () => {
    expect(
      gradeDataQuality({ ...everything, environmentValid: false, temperatureValid: false })
    ).toBe("Low");
    expect(gradeDataQuality({ ...everything, compositionValid: false })).toBe("Low");
  });

  it("orders levels from Insufficient to High", () => {
    expect(compareQuality("Low", "High")).toBeLessThan(0);
    expect(compareQuality("Medium", "Insufficient")).toBeGreaterThan(0);
    expect(compareQuality("Low", "Low")).toBe(0);
  });
});
