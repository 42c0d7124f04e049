import { describe, expect, it } from "vitest";
import { parseArchivePayload } from "../../pipeline/services/archive-client.js";
import { reshapeArchivePayload } from "../../pipeline/services/response-reshaper.js";
import { buildArchivePayload } from "../fixtures/archive-payloads.js";

describe("reshapeArchivePayload", () => {
  it("broadcasts one day's aggregates over its 24 hourly rows", () => {
    const fragment = reshapeArchivePayload(
      buildArchivePayload("2024-03-01", "2024-03-01", 24),
      "Hà Nội"
    );

    expect(fragment.records).toHaveLength(24);
    expect(fragment.metricColumns).toEqual([
      "Weather code",
      "Daily weather code",
      "Temperature (°C)",
      "Daily max temperature (°C)",
      "Sunrise"
    ]);

    for (const record of fragment.records) {
      expect(record.region).toBe("Hà Nội");
      expect(record.metrics["Daily weather code"]).toBe(61);
      expect(record.metrics["Daily max temperature (°C)"]).toBe(1);
      expect(record.metrics.Sunrise).toBe("05:42");
      expect(Object.keys(record.metrics)).not.toContain("Date");
    }

    expect(fragment.records[5]).toEqual({
      region: "Hà Nội",
      timestamp: "2024-03-01 05:00:00",
      metrics: {
        "Temperature (°C)": 5,
        "Weather code": 3,
        "Daily weather code": 61,
        "Daily max temperature (°C)": 1,
        Sunrise: "05:42"
      }
    });
  });

  it("fills daily columns with null when the date has no daily row", () => {
    const payload = parseArchivePayload({
      hourly: { time: ["2024-03-02T00:00"], temperature_2m: [21.5] },
      daily: { time: ["2024-03-01"], temperature_2m_max: [30.1] }
    });

    const fragment = reshapeArchivePayload(payload, "Huế");

    expect(fragment.records).toEqual([
      {
        region: "Huế",
        timestamp: "2024-03-02 00:00:00",
        metrics: { "Temperature (°C)": 21.5, "Daily max temperature (°C)": null }
      }
    ]);
  });

  it("returns an empty fragment when the hourly series is empty", () => {
    const payload = parseArchivePayload({
      hourly: { time: [], temperature_2m: [] },
      daily: { time: [], temperature_2m_max: [] }
    });

    expect(reshapeArchivePayload(payload, "Huế")).toEqual({ metricColumns: [], records: [] });
  });

  it("drops hourly rows whose time does not parse and keeps payloads without daily data", () => {
    const payload = parseArchivePayload({
      hourly: {
        time: ["2024-03-01T00:00", "not-a-time", "2024-02-30T01:00"],
        temperature_2m: [20, 21, 22],
        weather_code: [1, 2, 3]
      }
    });

    const fragment = reshapeArchivePayload(payload, "Cần Thơ");

    expect(fragment.metricColumns).toEqual(["Weather code", "Temperature (°C)"]);
    expect(fragment.records.map((record) => record.timestamp)).toEqual(["2024-03-01 00:00:00"]);
  });

  it("keeps unmapped metric ids under their own name and nulls non-finite values", () => {
    const payload = parseArchivePayload({
      hourly: { time: ["2024-03-01T00:00"], soil_moisture_0_to_7cm: [null], precipitation: ["1.2"] }
    });

    const [record] = reshapeArchivePayload(payload, "Lào Cai").records;

    expect(record?.metrics).toEqual({
      soil_moisture_0_to_7cm: null,
      "Precipitation (mm)": "1.2"
    });
  });
});
