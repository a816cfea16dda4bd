import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { setLogLevel } from "../../lib/logger.js";
import { combine, recordsToTable } from "./merge.js";
import type { NormalizedRecord } from "./types.js";

function record(
  date: string,
  kind: NormalizedRecord["kind"],
  fields: NormalizedRecord["fields"],
  deviceId = "dev-1"
): NormalizedRecord {
  return { deviceId, date, kind, fields };
}

beforeEach(() => {
  setLogLevel("error");
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("recordsToTable", () => {
  it("should lead with device and date columns", () => {
    const table = recordsToTable([
      record("15/01/2024", "spo2", { Average_SP02: 96, SPO2_Min: null }),
      record("16/01/2024", "spo2", { Average_SP02: 95, SPO2_Max: 99 }),
    ]);

    expect(table.columns).toEqual(["Id_dispositivo", "DateTime", "Average_SP02", "SPO2_Min", "SPO2_Max"]);
    expect(table.rows[1]).toEqual({
      Id_dispositivo: "dev-1",
      DateTime: "16/01/2024",
      Average_SP02: 95,
      SPO2_Max: 99,
    });
  });

  it("should have no columns without records", () => {
    expect(recordsToTable([])).toEqual({ columns: [], rows: [] });
  });
});

describe("combine", () => {
  const steps = [
    record("15/01/2024", "steps", { TotalSteps: 8000 }),
    record("16/01/2024", "steps", { TotalSteps: 9000 }),
  ];
  const sleep = [record("16/01/2024", "sleep", { logId: 41001, minutesAsleep: 420 })];
  const spo2 = [record("17/01/2024", "spo2", { Average_SP02: 96 })];

  it("should return null when every set is empty", () => {
    expect(combine([[], []])).toBeNull();
  });

  it("should join rows on device and date in first-seen order", () => {
    const result = combine([steps, sleep, spo2]);

    expect(result?.columns).toEqual([
      "Id_dispositivo",
      "DateTime",
      "TotalSteps",
      "logId",
      "minutesAsleep",
      "Average_SP02",
    ]);
    expect(result?.joined.map((row) => row.date)).toEqual(["15/01/2024", "16/01/2024", "17/01/2024"]);
    expect(result?.joined[1].fields).toEqual({ TotalSteps: 9000, logId: 41001, minutesAsleep: 420 });
  });

  it("should split complete and incomplete rows by sleep log", () => {
    const result = combine([steps, sleep, spo2]);

    expect(result?.complete.rows).toEqual([
      {
        Id_dispositivo: "dev-1",
        DateTime: "16/01/2024",
        TotalSteps: 9000,
        logId: 41001,
        minutesAsleep: 420,
        Average_SP02: null,
      },
    ]);
    expect(result?.incomplete.rows.map((row) => row.DateTime)).toEqual(["15/01/2024", "17/01/2024"]);
    expect(result?.incomplete.rows[0].logId).toBeNull();
  });

  it("should partition every joined row exactly once", () => {
    const result = combine([steps, sleep, spo2]);
    const total = (result?.complete.rows.length ?? 0) + (result?.incomplete.rows.length ?? 0);

    expect(total).toBe(result?.joined.length);
  });

  it("should add the log id column when no sleep data exists", () => {
    const result = combine([steps]);

    expect(result?.columns).toEqual(["Id_dispositivo", "DateTime", "TotalSteps", "logId"]);
    expect(result?.complete.rows).toEqual([]);
    expect(result?.incomplete.rows).toHaveLength(2);
  });

  it("should keep devices apart", () => {
    const result = combine([steps, [record("15/01/2024", "steps", { TotalSteps: 1 }, "dev-2")]]);

    expect(result?.joined).toHaveLength(3);
  });
});
