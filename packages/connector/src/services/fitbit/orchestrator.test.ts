import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeAll, afterAll, afterEach, beforeEach } from "vitest";
import { setupServer } from "msw/node";
import { http, HttpResponse } from "msw";
import { loadConfig } from "../../lib/config.js";
import { QuotaExceededError } from "../../lib/errors.js";
import { setLogLevel } from "../../lib/logger.js";
import {
  processBundle,
  processDataset,
  resolveDateRange,
  retrieveAndSave,
  validateDateRange,
} from "./orchestrator.js";
import { DataStorage } from "./storage.js";
import type { RawBundle } from "./types.js";

const BASE = "http://fitbit.test";
const TOKEN = { access_token: "test-token", refresh_token: "test-refresh", user_id: "USER1" };

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterAll(() => server.close());

let dataDir: string;

beforeEach(async () => {
  setLogLevel("error");
  vi.spyOn(console, "log").mockImplementation(() => {});
  dataDir = await mkdtemp(join(tmpdir(), "fitbit-orchestrator-"));
});

afterEach(async () => {
  server.resetHandlers();
  vi.restoreAllMocks();
  await rm(dataDir, { recursive: true, force: true });
});

function bundle(overrides: Partial<RawBundle> = {}): RawBundle {
  return {
    device_id: "dev-1",
    steps: [],
    heart: [],
    calories: [],
    sleep: [],
    spo2: [],
    rate: [],
    ...overrides,
  };
}

describe("validateDateRange", () => {
  const today = "2024-03-10";

  it("should accept a past range within the limit", () => {
    expect(validateDateRange("2024-02-01", "2024-03-02", today, 30)).toBeNull();
  });

  it.each([
    ["2024/02/01", "2024-02-02", "Invalid date format. Please use 'YYYY-MM-DD'."],
    ["2024-02-30", "2024-03-01", "Invalid date format. Please use 'YYYY-MM-DD'."],
    ["1999-12-30", "2000-01-02", "Year must be greater than 2000."],
    ["2024-03-01", "2024-03-10", "End date cannot be in the future or today. Please enter a valid range."],
    ["2024-03-05", "2024-03-01", "Start date cannot be greater than end date. Please enter a valid range."],
    ["2024-01-01", "2024-02-01", "Date range must not exceed 30 days. Please enter a valid range."],
  ])("should refuse %s to %s", (start, end, reason) => {
    expect(validateDateRange(start, end, today, 30)).toBe(reason);
  });
});

describe("resolveDateRange", () => {
  it("should end a day count today", () => {
    expect(resolveDateRange({ days: 3 }, "2024-03-01", 30)).toEqual({
      startDate: "2024-02-28",
      endDate: "2024-03-01",
    });
  });

  it("should reject a non-positive day count", () => {
    expect(() => resolveDateRange({ days: 0 }, "2024-03-01", 30)).toThrow("Invalid number of days");
  });

  it("should throw the validation message for a bad range", () => {
    expect(() => resolveDateRange({ from: "2024-03-05", to: "2024-03-01" }, "2024-03-10", 30)).toThrow(
      "Start date cannot be greater than end date"
    );
  });
});

describe("processBundle", () => {
  const sample = bundle({
    steps: [
      { "activities-steps": [{ dateTime: "2024-01-15", value: "8000" }] },
      { "activities-steps": [{ dateTime: "2024-01-16", value: "9000" }] },
    ],
    sleep: [{ sleep: [{ logId: 41001, dateOfSleep: "2024-01-15", isMainSleep: true, minutesAsleep: 420 }] }],
  });

  it("should write every table and split the merge on sleep logs", async () => {
    const result = await processBundle(sample, new DataStorage(dataDir));

    expect((await readdir(dataDir)).sort()).toEqual([
      "AverageRate.csv",
      "Calories.csv",
      "HeartRateData.csv",
      "Merged.csv",
      "Registros_Incompletos.csv",
      "RestingHeartRate.csv",
      "SPO2.csv",
      "Sleep.csv",
      "Steps.csv",
    ]);
    expect(result.counts.steps).toBe(2);
    expect(result.counts.sleep).toBe(1);
    expect(result.completeRows).toBe(1);
    expect(result.incompleteRows).toBe(1);
    expect(await readFile(join(dataDir, "Steps.csv"), "utf-8")).toBe(
      "Id_dispositivo,DateTime,TotalSteps\ndev-1,15/01/2024,8000\ndev-1,16/01/2024,9000\n"
    );
    expect(await readFile(join(dataDir, "Calories.csv"), "utf-8")).toBe("");
  });

  it("should order merged columns with sleep first", async () => {
    await processBundle(sample, new DataStorage(dataDir));

    const [header, row] = (await readFile(join(dataDir, "Registros_Incompletos.csv"), "utf-8")).split("\n");
    expect(header.startsWith("Id_dispositivo,DateTime,logId,startTime,")).toBe(true);
    expect(header.endsWith(",TotalSteps")).toBe(true);
    expect(row.startsWith("dev-1,16/01/2024,,")).toBe(true);
    expect(row.endsWith(",9000")).toBe(true);
  });

  it("should skip the merged tables when there is no data", async () => {
    const result = await processBundle(bundle(), new DataStorage(dataDir));

    expect(result.files).toHaveLength(7);
    expect(result.completeRows).toBe(0);
  });
});

describe("retrieveAndSave", () => {
  const now = new Date(2024, 0, 10, 12, 0, 0);

  function serveAccount(devices: unknown[]): { paths: string[] } {
    const paths: string[] = [];
    server.use(
      http.get(`${BASE}/1/user/USER1/devices.json`, () => HttpResponse.json(devices)),
      http.get(`${BASE}/*`, ({ request }) => {
        const { pathname } = new URL(request.url);
        paths.push(pathname);
        const match = pathname.match(/activities\/steps\/date\/([\d-]+)\/1d\.json$/);
        if (match) {
          return HttpResponse.json({ "activities-steps": [{ dateTime: match[1], value: "1000" }] });
        }
        return HttpResponse.json({});
      })
    );
    return { paths };
  }

  function config() {
    return loadConfig({ FITBIT_DATA_DIR: dataDir, FITBIT_API_BASE: BASE, FITBIT_ACCOUNT: "alice" });
  }

  it("should fetch the range and save the bundle", async () => {
    const { paths } = serveAccount([{ id: "dev-9", deviceVersion: "Charge 6" }]);

    const result = await retrieveAndSave({
      config: config(),
      range: { from: "2024-01-01", to: "2024-01-02" },
      now,
      getToken: async () => TOKEN,
      sleep: async () => {},
    });

    expect(paths).toHaveLength(12);
    expect(result.deviceId).toBe("dev-9");
    expect(result.datasetDir).toBe(join(dataDir, "alice", "2024-01-10_12-00-00"));
    expect(result.bundle.steps).toHaveLength(2);
    expect(result.bundle.sleep).toEqual([]);
    expect(result.stats.successful.steps).toBe(2);
    expect(result.stats.successful.devices).toBe(1);

    const saved: unknown = JSON.parse(await readFile(join(result.datasetDir, "fitbit_data.json"), "utf-8"));
    expect(saved).toEqual(result.bundle);
    const text = await readFile(join(result.datasetDir, "fitbit_data.txt"), "utf-8");
    expect(text.split("\n")[0]).toBe("device_id: dev-9");
  });

  it("should refuse a range larger than the remaining quota before fetching", async () => {
    const { paths } = serveAccount([{ id: "dev-9" }]);
    server.use(
      http.get(`${BASE}/1/user/USER1/devices.json`, () =>
        HttpResponse.json([{ id: "dev-9" }], { headers: { "fitbit-rate-limit-remaining": "5" } })
      )
    );

    await expect(
      retrieveAndSave({
        config: config(),
        range: { days: 2 },
        now,
        getToken: async () => TOKEN,
        sleep: async () => {},
      })
    ).rejects.toBeInstanceOf(QuotaExceededError);
    expect(paths).toEqual([]);
    expect(await readdir(dataDir)).toEqual([]);
  });

  it("should abort when no device can be chosen", async () => {
    serveAccount([{ id: "dev-1" }, { id: "dev-2" }]);

    await expect(
      retrieveAndSave({
        config: config(),
        range: { days: 1 },
        now,
        getToken: async () => TOKEN,
      })
    ).rejects.toThrow("Failed to retrieve device ID. Aborting data retrieval.");
  });
});

describe("processDataset", () => {
  it("should process a saved dataset in place", async () => {
    const storage = new DataStorage(dataDir);
    await storage.saveJson(bundle({ spo2: [{ dateTime: "2024-01-15", value: { avg: 96, min: 93, max: 99 } }] }));

    const result = await processDataset(dataDir);

    expect(result.counts.spo2).toBe(1);
    expect(await readFile(join(dataDir, "SPO2.csv"), "utf-8")).toBe(
      "Id_dispositivo,DateTime,Average_SP02,SPO2_Min,SPO2_Max\ndev-1,15/01/2024,96,93,99\n"
    );
  });
});
