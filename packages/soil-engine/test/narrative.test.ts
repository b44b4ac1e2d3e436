import { describe, expect, it } from "vitest";
import { createSoilProfileBuilder } from "../src/engine/profile-builder.js";
import { toNarrativeDocument } from "../src/narrative.js";
import { FIXED_NOW, failedResult, loadFixture, makeResult, okResult } from "./helpers/fixtures.js";

describe("toNarrativeDocument", () => {
  it("rounds valid readings and lists the sources that answered", () => {
    const core = createSoilProfileBuilder().build(
      okResult(loadFixture("openweather-current")),
      okResult(loadFixture("nasa-power-daily")),
      failedResult()
    );
    const document = toNarrativeDocument(makeResult({ ...core }));

    expect(document.location).toEqual({ latitude: 12.34567, longitude: -45.6 });
    expect(document.observedAt).toBe(FIXED_NOW.toISOString());
    expect(document.dataQuality).toBe("Low");
    expect(document.climate).toEqual({ temperatureC: 21.5, humidityPct: 64, precipitationMm: 2 });
    expect(document.soil).toEqual({
      type: "Unknown",
      clayPct: null,
      sandPct: null,
      siltPct: null,
      ph: null,
      organicMatterPct: null,
      nitrogenPct: null,
      moisturePct: null
    });
    expect(document.dataSources).toEqual(["openweathermap", "nasa-power"]);
    expect(document).not.toHaveProperty("error");
  });

  it("reports soil values for a complete profile", () => {
    const core = createSoilProfileBuilder().build(
      okResult(loadFixture("openweather-current")),
      okResult(loadFixture("nasa-power-daily")),
      okResult(loadFixture("soilgrids-query"))
    );
    const { soil } = toNarrativeDocument(makeResult({ ...core }));

    expect(soil.type).toBe("Loam");
    expect(soil.clayPct).toBe(25);
    expect(soil.ph).toBe(6.5);
    expect(soil.organicMatterPct).toBe(1.16);
    expect(soil.nitrogenPct).toBe(0.058);
  });

  it("carries the error of a failed analysis", () => {
    const document = toNarrativeDocument(makeResult({ error: "Latitude must be between -90 and 90, received 200" }));

    expect(document.error).toBe("Latitude must be between -90 and 90, received 200");
    expect(document.dataSources).toEqual([]);
    expect(document.climate.temperatureC).toBeNull();
  });
});
