import { describe, expect, it, vi } from "vitest";
import { FatalRemoteError, RetriesExhaustedError, ThrottledError } from "./errors";
import {
  calculateBackoff,
  guardRemoteCall,
  retryRemoteCall,
  retryable,
  success,
  TimeoutError,
  withCallTimeout,
  type RemoteCallResult,
} from "./retry";
import { compareSequenceNumbers } from "./sequence-number";
import type { ReplayLogger } from "./types";

const POLICY = { maxRetries: 3, retryWaitTimeMs: 50, retryTimeoutMs: 10000 };

const instantSleep = async (): Promise<void> => undefined;

describe("guardRemoteCall", () => {
  it("wraps a resolved value as success", async () => {
    await expect(guardRemoteCall(async () => "cursor-1", 1000)).resolves.toEqual({
      kind: "success",
      value: "cursor-1",
    });
  });

  it("classifies throttling as retryable", async () => {
    const throttled = new ThrottledError();
    const result = await guardRemoteCall(async () => {
      throw throttled;
    }, 1000);

    expect(result).toEqual({ kind: "retryable", error: throttled });
  });

  it("classifies any other failure as fatal", async () => {
    const result = await guardRemoteCall(async () => {
      throw new Error("stream not found");
    }, 1000);

    expect(result.kind).toBe("fatal");
  });

  it("treats a call that outlives its timeout as fatal", async () => {
    const result = await guardRemoteCall(() => new Promise<string>(() => undefined), 5);

    expect(result.kind).toBe("fatal");
    if (result.kind === "fatal") expect(result.error).toBeInstanceOf(TimeoutError);
  });
});

describe("withCallTimeout", () => {
  it("passes a settled result through unchanged", async () => {
    const throttled = new ThrottledError();

    await expect(withCallTimeout(async () => success("cursor-2"), 1000)).resolves.toEqual({
      kind: "success",
      value: "cursor-2",
    });
    await expect(withCallTimeout(async () => retryable<string>(throttled), 1000)).resolves.toEqual({
      kind: "retryable",
      error: throttled,
    });
  });

  it("turns a result that never arrives into a fatal timeout", async () => {
    const result = await withCallTimeout(() => new Promise<RemoteCallResult<string>>(() => undefined), 5);

    expect(result.kind).toBe("fatal");
    if (result.kind === "fatal") expect(result.error).toBeInstanceOf(TimeoutError);
  });
});

describe("retryRemoteCall", () => {
  it("returns the value once a retried call succeeds and logs each throttled attempt", async () => {
    const results: Array<RemoteCallResult<string>> = [
      retryable(new ThrottledError("slow down")),
      retryable(new ThrottledError("slow down")),
      success("page"),
    ];
    const call = vi.fn(async () => results.shift() ?? success("unexpected"));
    const logger: ReplayLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const sleeps: number[] = [];

    const value = await retryRemoteCall("listing records", call, POLICY, {
      logger,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    expect(value).toBe("page");
    expect(call).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([50, 100]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(1, "error while listing records", {
      attempt: 1,
      err: "slow down",
    });
  });

  it("stops at the first fatal result", async () => {
    const call = vi.fn(async (): Promise<RemoteCallResult<string>> => ({
      kind: "fatal",
      error: new Error("stream deleted"),
    }));

    await expect(retryRemoteCall("listing records", call, POLICY, { sleep: instantSleep })).rejects.toThrow(
      FatalRemoteError,
    );
    expect(call).toHaveBeenCalledTimes(1);
  });

  it("reports exhausted retries with the last error as cause", async () => {
    const last = new ThrottledError("still throttled");
    const call = vi.fn(async (): Promise<RemoteCallResult<string>> => retryable(last));

    const error = await retryRemoteCall("listing records", call, POLICY, { sleep: instantSleep }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(RetriesExhaustedError);
    expect(error).toHaveProperty("cause", last);
    expect(error).toHaveProperty(
      "message",
      "Gave up after 3 retries while listing records, last error: still throttled",
    );
  });
});

describe("calculateBackoff", () => {
  it("doubles from the base delay", () => {
    expect(calculateBackoff(0, 100)).toBe(100);
    expect(calculateBackoff(3, 100)).toBe(800);
  });

  it("respects the maximum delay", () => {
    expect(calculateBackoff(5, 100, 1000)).toBe(1000);
  });
});

describe("compareSequenceNumbers", () => {
  it("orders decimal sequence numbers numerically", () => {
    expect(compareSequenceNumbers("99", "100")).toBe(-1);
    expect(
      compareSequenceNumbers(
        "49590338271490256608559692538361571095921575989136588899",
        "49590338271490256608559692538361571095921575989136588898",
      ),
    ).toBe(1);
    expect(compareSequenceNumbers("105", "105")).toBe(0);
  });

  it("falls back to length then lexicographic order", () => {
    expect(compareSequenceNumbers("b", "aa")).toBe(-1);
    expect(compareSequenceNumbers("ab", "aa")).toBe(1);
  });
});
