import { describe, it, expect, vi, beforeAll, afterAll, afterEach, beforeEach } from "vitest";
import { setupServer } from "msw/node";
import { http, HttpResponse } from "msw";
import { setLogLevel } from "../../lib/logger.js";
import { FitbitApiClient, describeErrorBody } from "./api-client.js";
import { QuotaTracker } from "./quota-tracker.js";

const BASE = "http://fitbit.test";
const ENDPOINT = "/1/user/-/activities/steps/date/2024-01-15/1d.json";
const STEPS_BODY = { "activities-steps": [{ dateTime: "2024-01-15", value: "8000" }] };

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

/**
 * Serve the given responses in order, one per request.
 */
function sequence(responses: Array<() => Response>): { calls: () => number } {
  let index = 0;
  server.use(
    http.get(`${BASE}${ENDPOINT}`, () => {
      const respond = responses[Math.min(index, responses.length - 1)];
      index++;
      return respond();
    })
  );
  return { calls: () => index };
}

function createClient(quota = new QuotaTracker()) {
  const sleep = vi.fn(async (_seconds: number) => {});
  const client = new FitbitApiClient({
    accessToken: "test-token",
    quota,
    baseUrl: BASE,
    sleep,
  });
  return { client, sleep, quota };
}

describe("FitbitApiClient", () => {
  beforeEach(() => {
    setLogLevel("error");
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should return the body and count a success on 200", async () => {
    const { client, sleep } = createClient();
    sequence([() => HttpResponse.json(STEPS_BODY)]);

    const result = await client.fetch(ENDPOINT, "steps");

    expect(result).toEqual(STEPS_BODY);
    expect(sleep).not.toHaveBeenCalled();
    const stats = client.getStats();
    expect(stats.successful.steps).toBe(1);
    expect(stats.failed.steps).toBe(0);
    expect(stats.totalRequests).toBe(1);
  });

  it("should send the bearer token", async () => {
    const { client } = createClient();
    let authorization: string | null = null;
    server.use(
      http.get(`${BASE}${ENDPOINT}`, ({ request }) => {
        authorization = request.headers.get("Authorization");
        return HttpResponse.json(STEPS_BODY);
      })
    );

    await client.fetch(ENDPOINT, "steps");

    expect(authorization).toBe("Bearer test-token");
  });

  it("should update the quota from every response", async () => {
    const { client, quota } = createClient();
    sequence([
      () =>
        HttpResponse.json(STEPS_BODY, {
          headers: {
            "Fitbit-Rate-Limit-Limit": "150",
            "Fitbit-Rate-Limit-Remaining": "77",
            "Fitbit-Rate-Limit-Reset": "1234",
          },
        }),
    ]);

    await client.fetch(ENDPOINT, "steps");

    expect(quota.snapshot()).toEqual({ limit: 150, remaining: 77, resetSeconds: 1234 });
  });

  it("should wait out 429 responses without counting failures", async () => {
    const { client, sleep } = createClient();
    const server429 = sequence([
      () =>
        HttpResponse.json({}, { status: 429, headers: { "Fitbit-Rate-Limit-Reset": "2" } }),
      () =>
        HttpResponse.json({}, { status: 429, headers: { "Fitbit-Rate-Limit-Reset": "0" } }),
      () => HttpResponse.json(STEPS_BODY),
    ]);

    const result = await client.fetch(ENDPOINT, "steps");

    expect(result).toEqual(STEPS_BODY);
    expect(server429.calls()).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 3);
    expect(sleep).toHaveBeenNthCalledWith(2, 1);
    const stats = client.getStats();
    expect(stats.successful.steps).toBe(1);
    expect(stats.failed.steps).toBe(0);
  });

  it("should back off linearly on server errors and recover", async () => {
    const { client, sleep } = createClient();
    sequence([
      () => HttpResponse.json({ errors: [{ message: "boom" }] }, { status: 500 }),
      () => HttpResponse.json(STEPS_BODY),
    ]);

    const result = await client.fetch(ENDPOINT, "steps");

    expect(result).toEqual(STEPS_BODY);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1.5);
    expect(client.getStats().failed.steps).toBe(0);
  });

  it("should return null after maxRetries failures and count one failure", async () => {
    const { client, sleep } = createClient();
    const failing = sequence([() => HttpResponse.json({}, { status: 500 })]);

    const result = await client.fetch(ENDPOINT, "steps", 3);

    expect(result).toBeNull();
    expect(failing.calls()).toBe(3);
    expect(sleep.mock.calls.map(([seconds]) => seconds)).toEqual([1.5, 3, 4.5]);
    const stats = client.getStats();
    expect(stats.failed.steps).toBe(1);
    expect(stats.successful.steps).toBe(0);
    expect(stats.totalRequests).toBe(3);
  });

  it("should treat network faults as retryable attempts", async () => {
    const { client, sleep } = createClient();
    sequence([() => HttpResponse.error(), () => HttpResponse.json(STEPS_BODY)]);

    const result = await client.fetch(ENDPOINT, "steps");

    expect(result).toEqual(STEPS_BODY);
    expect(sleep).toHaveBeenCalledWith(1.5);
  });

  it("should retry a truncated 200 body and give up without throwing", async () => {
    const { client, sleep } = createClient();
    const truncated = sequence([() => HttpResponse.text('{"activities-steps": [', { status: 200 })]);

    const result = await client.fetch(ENDPOINT, "steps", 2);

    expect(result).toBeNull();
    expect(truncated.calls()).toBe(2);
    expect(sleep.mock.calls.map(([seconds]) => seconds)).toEqual([1.5, 3]);
    const stats = client.getStats();
    expect(stats.successful.steps).toBe(0);
    expect(stats.failed.steps).toBe(1);
    expect(stats.totalRequests).toBe(2);
  });

  it("should recover when a later attempt returns a readable body", async () => {
    const { client } = createClient();
    sequence([() => HttpResponse.text("not json", { status: 200 }), () => HttpResponse.json(STEPS_BODY)]);

    const result = await client.fetch(ENDPOINT, "steps");

    expect(result).toEqual(STEPS_BODY);
    expect(client.getStats().successful.steps).toBe(1);
  });

  it("should keep counters per resource", async () => {
    const { client } = createClient();
    server.use(
      http.get(`${BASE}/1/user/-/devices.json`, () => HttpResponse.json([])),
      http.get(`${BASE}/1/user/-/spo2/date/2024-01-15.json`, () =>
        HttpResponse.json({}, { status: 404 })
      )
    );

    await client.fetch("/1/user/-/devices.json", "devices");
    await client.fetch("/1/user/-/spo2/date/2024-01-15.json", "spo2", 1);

    const stats = client.getStats();
    expect(stats.successful.devices).toBe(1);
    expect(stats.failed.spo2).toBe(1);
    expect(stats.successful.steps).toBe(0);
  });
});

describe("describeErrorBody", () => {
  it("should join error messages", () => {
    const body = JSON.stringify({
      errors: [{ message: "Invalid date" }, { message: "Scope missing" }],
    });

    expect(describeErrorBody(body)).toBe("Invalid date, Scope missing");
  });

  it("should fall back when no messages are present", () => {
    expect(describeErrorBody("{}")).toBe("Unknown Error");
  });

  it("should report unparsable bodies", () => {
    expect(describeErrorBody("<html>")).toBe("Failed to parse JSON response");
  });
});
