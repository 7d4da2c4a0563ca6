import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { requestJson, type RequestPolicy } from "../request";
import {
  FakeClock,
  instantLimiter,
  jsonResponse,
  queuedFetch,
  silenceConsole,
} from "../../__tests__/helpers";

const URL_UNDER_TEST = "https://api.example.test/items";

function policyWith(
  fetchImpl: RequestPolicy["fetchImpl"],
  clock: FakeClock,
  extra: Partial<RequestPolicy> = {},
): RequestPolicy {
  return {
    label: "test",
    limiter: instantLimiter(clock),
    clock,
    fetchImpl,
    ...extra,
  };
}

describe("requestJson", () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
    silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns parsed JSON on success", async () => {
    const fetchImpl = queuedFetch(jsonResponse(200, { items: [1, 2] }));

    const result = await requestJson<{ items: number[] }>(
      URL_UNDER_TEST,
      {},
      policyWith(fetchImpl, clock),
    );

    expect(result).toEqual({ ok: true, status: 200, data: { items: [1, 2] } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("returns null data for an empty body", async () => {
    const fetchImpl = queuedFetch(jsonResponse(201));

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result).toEqual({ ok: true, status: 201, data: null });
  });

  it("sends JSON bodies with method and headers", async () => {
    const fetchImpl = queuedFetch(jsonResponse(200, {}));

    await requestJson(
      URL_UNDER_TEST,
      { method: "POST", body: { name: "x" } },
      policyWith(fetchImpl, clock, { headers: () => ({ "x-api-key": "test-key" }) }),
    );

    const init = fetchImpl.mock.calls[0][1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"name":"x"}');
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "x-api-key": "test-key",
      "Content-Type": "application/json",
    });
  });

  it("retries 5xx with linear backoff", async () => {
    const fetchImpl = queuedFetch(jsonResponse(503), jsonResponse(200, { ok: 1 }));

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result.ok).toBe(true);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it("gives up after retries are exhausted", async () => {
    const fetchImpl = queuedFetch(
      jsonResponse(500),
      jsonResponse(500),
      jsonResponse(500),
      jsonResponse(500),
    );

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result).toEqual({ ok: false, status: 500, reason: "HTTP 500" });
    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([1000, 2000, 3000]);
  });

  it("honours Retry-After on 429", async () => {
    const fetchImpl = queuedFetch(
      jsonResponse(429, undefined, { "Retry-After": "2" }),
      jsonResponse(200, {}),
    );

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result.ok).toBe(true);
    expect(clock.sleeps).toEqual([2000]);
  });

  it("falls back to the default wait on 429 without Retry-After", async () => {
    const fetchImpl = queuedFetch(jsonResponse(429), jsonResponse(200, {}));

    await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(clock.sleeps).toEqual([5000]);
  });

  it("does not retry other 4xx responses", async () => {
    const fetchImpl = queuedFetch(jsonResponse(404, { code: 404 }));

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result).toEqual({ ok: false, status: 404, reason: "HTTP 404" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("refreshes credentials once on 401 with fresh headers", async () => {
    const fetchImpl = queuedFetch(jsonResponse(401), jsonResponse(200, {}));
    let token = "old-token";
    const onUnauthorized = vi.fn(() => {
      token = "new-token";
    });

    const result = await requestJson(
      URL_UNDER_TEST,
      {},
      policyWith(fetchImpl, clock, {
        headers: () => ({ Authorization: `Bearer ${token}` }),
        onUnauthorized,
      }),
    );

    expect(result.ok).toBe(true);
    expect(onUnauthorized).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[1][1]?.headers).toEqual({
      Accept: "application/json",
      Authorization: "Bearer new-token",
    });
  });

  it("treats a second 401 as final", async () => {
    const fetchImpl = queuedFetch(jsonResponse(401), jsonResponse(401));
    const onUnauthorized = vi.fn();

    const result = await requestJson(
      URL_UNDER_TEST,
      {},
      policyWith(fetchImpl, clock, { onUnauthorized }),
    );

    expect(result).toEqual({ ok: false, status: 401, reason: "HTTP 401" });
    expect(onUnauthorized).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("retries network errors and reports them without throwing", async () => {
    const failure = new Error("socket hang up");
    const fetchImpl = queuedFetch(failure, failure, failure, failure);

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result).toEqual({ ok: false, status: null, reason: "socket hang up" });
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });

  it("retries when resolving headers fails and gives up without throwing", async () => {
    const fetchImpl = queuedFetch();
    const headers = vi.fn(async (): Promise<Record<string, string>> => {
      throw new Error("token endpoint down");
    });

    const result = await requestJson(
      URL_UNDER_TEST,
      {},
      policyWith(fetchImpl, clock, { headers }),
    );

    expect(result).toEqual({ ok: false, status: null, reason: "token endpoint down" });
    expect(headers).toHaveBeenCalledTimes(4);
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(clock.sleeps).toEqual([1000, 2000, 3000]);
  });

  it("does not retry a body that is not JSON", async () => {
    const fetchImpl = queuedFetch(new Response("<html>", { status: 200 }));

    const result = await requestJson(URL_UNDER_TEST, {}, policyWith(fetchImpl, clock));

    expect(result.ok).toBe(false);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
