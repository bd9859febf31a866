import { describe, expect, it, vi } from "vitest";
import { fixedRetryPolicy, withRetry } from "./retry";
import { RetryExhaustedError, ValidationError } from "../utils/errors";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn(async () => "done");

    await expect(withRetry("task", fixedRetryPolicy(), fn)).resolves.toBe("done");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("re-runs the whole call after a failure", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("network down"))
      .mockResolvedValueOnce("done");

    await expect(withRetry("task", fixedRetryPolicy(2), fn)).resolves.toBe("done");
    expect(fn.mock.calls).toEqual([[1], [2]]);
  });

  it("throws RetryExhaustedError after the last attempt", async () => {
    const cause = new Error("still down");
    const fn = vi.fn(async () => {
      throw cause;
    });

    const error = await withRetry("task", fixedRetryPolicy(2), fn).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({
      message: "Max retries reached for task: still down",
      attempts: 2,
      lastError: cause,
    });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("stops immediately when shouldRetry declines", async () => {
    const fn = vi.fn(async () => {
      throw new ValidationError("bad input");
    });

    await expect(
      withRetry(
        "task",
        {
          maxAttempts: 3,
          shouldRetry: (error) => !(error instanceof ValidationError),
        },
        fn
      )
    ).rejects.toThrow(ValidationError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("waits between attempts but not after the last one", async () => {
    const backoffMs = vi.fn((attempt: number) => attempt);
    const fn = vi.fn(async () => {
      throw new Error("fail");
    });

    await expect(
      withRetry("task", { maxAttempts: 3, backoffMs }, fn)
    ).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(backoffMs.mock.calls).toEqual([[1], [2]]);
  });
});
