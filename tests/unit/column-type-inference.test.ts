import { describe, expect, it } from "vitest";
import {
  buildCreateTableSql,
  inferColumnDefinitions,
  inferColumnType
} from "../../pipeline/services/column-type-inference.js";

describe("inferColumnType", () => {
  it("prefers NUMERIC, then TIMESTAMP, then TEXT", () => {
    expect(inferColumnType(["21.5", "-3", "1e3", ".5"])).toBe("NUMERIC");
    expect(inferColumnType(["2024-01-01 00:00:00", "2024-01-01"])).toBe("TIMESTAMP");
    expect(inferColumnType(["05:42", "05:43"])).toBe("TEXT");
    expect(inferColumnType(["Huế", "Hà Nội"])).toBe("TEXT");
  });

  it("ignores empty cells and falls back to TEXT for an empty sample", () => {
    expect(inferColumnType(["", "3", " "])).toBe("NUMERIC");
    expect(inferColumnType(["", ""])).toBe("TEXT");
    expect(inferColumnType([])).toBe("TEXT");
  });

  it("types a column mixing numbers and dates as TEXT", () => {
    expect(inferColumnType(["2024", "2024-01-01"])).toBe("TEXT");
  });
});

describe("inferColumnDefinitions", () => {
  it("samples only the first 100 rows", () => {
    const rows = [
      ...Array.from({ length: 100 }, (_, index) => ["Huế", String(index), "2024-01-01 00:00:00"]),
      ["Huế", "not a number", "2024-01-01 01:00:00"]
    ];

    expect(inferColumnDefinitions(["Region", "Temperature (°C)", "Datetime"], rows)).toEqual([
      { name: "Region", type: "TEXT" },
      { name: "Temperature (°C)", type: "NUMERIC" },
      { name: "Datetime", type: "TIMESTAMP" }
    ]);
  });
});

describe("buildCreateTableSql", () => {
  it("quotes identifiers", () => {
    expect(
      buildCreateTableSql("weather_data", [
        { name: "Region", type: "TEXT" },
        { name: 'Odd "name"', type: "NUMERIC" }
      ])
    ).toBe('CREATE TABLE IF NOT EXISTS "weather_data" ("Region" TEXT, "Odd ""name""" NUMERIC);');
  });
});
