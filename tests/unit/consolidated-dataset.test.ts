import { describe, expect, it } from "vitest";
import type { ObservationRecord } from "../../packages/shared/src/pipeline-types.js";
import { ConsolidatedDataset } from "../../pipeline/services/consolidated-dataset.js";

const record = (
  region: string,
  timestamp: string,
  metrics: ObservationRecord["metrics"] = {}
): ObservationRecord => ({ region, timestamp, metrics });

describe("ConsolidatedDataset", () => {
  it("keeps one row per region and timestamp with the later fragment winning", () => {
    const dataset = ConsolidatedDataset.empty();

    dataset.merge([
      {
        metricColumns: ["Temperature (°C)"],
        records: [
          record("Huế", "2024-01-01T00:00", { "Temperature (°C)": 20 }),
          record("Huế", "2024-01-01T01:00", { "Temperature (°C)": 21 })
        ]
      }
    ]);
    const stats = dataset.merge([
      {
        metricColumns: ["Temperature (°C)"],
        records: [
          record("Huế", "2024-01-01 01:00:00", { "Temperature (°C)": 25 }),
          record("Huế", "2024-01-01T02:00", { "Temperature (°C)": 22 })
        ]
      }
    ]);

    expect(stats).toEqual({ received: 2, inserted: 1, replaced: 1, dropped: 0 });
    expect(dataset.rows.map((row) => [row.timestamp, row.metrics["Temperature (°C)"]])).toEqual([
      ["2024-01-01 00:00:00", 20],
      ["2024-01-01 01:00:00", 25],
      ["2024-01-01 02:00:00", 22]
    ]);
  });

  it("sorts by region then timestamp and drops unparseable timestamps", () => {
    const dataset = ConsolidatedDataset.empty();

    const stats = dataset.merge([
      {
        metricColumns: [],
        records: [
          record("Huế", "2024-01-02T00:00"),
          record("An Giang", "2024-01-03T00:00"),
          record("Huế", "2024-01-01T00:00"),
          record("An Giang", "garbage"),
          record("", "2024-01-01T00:00")
        ]
      }
    ]);

    expect(stats.dropped).toBe(2);
    expect(dataset.rows.map((row) => `${row.region}|${row.timestamp}`)).toEqual([
      "An Giang|2024-01-03 00:00:00",
      "Huế|2024-01-01 00:00:00",
      "Huế|2024-01-02 00:00:00"
    ]);
  });

  it("places region first, code columns next and timestamp last", () => {
    const dataset = ConsolidatedDataset.empty();

    dataset.merge([
      {
        metricColumns: ["Temperature (°C)", "Daily weather code"],
        records: [record("Huế", "2024-01-01T00:00")]
      },
      {
        metricColumns: ["Precipitation (mm)", "Weather code"],
        records: [record("Huế", "2024-01-01T01:00")]
      }
    ]);

    expect(dataset.columns).toEqual([
      "Region",
      "Weather code",
      "Daily weather code",
      "Temperature (°C)",
      "Precipitation (mm)",
      "Datetime"
    ]);
  });

  it("tracks the latest timestamp per region across merges", () => {
    const dataset = ConsolidatedDataset.fromRecords(
      [],
      [record("Huế", "2023-12-31 23:00:00"), record("Hà Nội", "2024-01-05 10:00:00")]
    );

    expect(dataset.latestTimestamp("Huế")).toBe("2023-12-31 23:00:00");
    expect(dataset.latestTimestamp("Sơn La")).toBeNull();

    dataset.merge([{ metricColumns: [], records: [record("Huế", "2024-01-01T03:00")] }]);

    expect(dataset.latestTimestamp("Huế")).toBe("2024-01-01 03:00:00");
    expect(dataset.latestTimestamp("Hà Nội")).toBe("2024-01-05 10:00:00");
    expect(dataset.regions.sort()).toEqual(["Huế", "Hà Nội"].sort());
  });

  it("leaves the dataset untouched when merging nothing", () => {
    const dataset = ConsolidatedDataset.fromRecords([], [record("Huế", "2024-01-01 00:00:00")]);

    expect(dataset.merge([])).toEqual({ received: 0, inserted: 0, replaced: 0, dropped: 0 });
    expect(dataset.rowCount).toBe(1);
  });
});
