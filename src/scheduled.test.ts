import { describe, expect, it } from "vitest";
import { runTokenRefreshJob, runUploadJob } from "./scheduled";
import { createTestBindings } from "./testing/bindings";
import { StorageError } from "./utils/errors";

describe("runTokenRefreshJob", () => {
  it("summarizes the refresh result", async () => {
    const { job, result } = await runTokenRefreshJob(createTestBindings());

    expect(result.total).toBe(0);
    expect(job).toMatchObject({
      jobName: "token-refresh",
      success: true,
      message: "Total: 0, Refreshed: 0, Skipped: 0, Expired: 0, Failed: 0",
    });
    expect(job.duration).toBeGreaterThanOrEqual(0);
  });

  it("rethrows when the token store cannot be read", async () => {
    const env = createTestBindings({
      TOKEN_STORE: {
        get: async () => null,
        put: async () => undefined,
        list: async () => {
          throw new StorageError("Token file is not valid JSON");
        },
      },
    });

    await expect(runTokenRefreshJob(env)).rejects.toBeInstanceOf(StorageError);
  });
});

describe("runUploadJob", () => {
  it("marks the job failed when an entry fails", async () => {
    const { job, result } = await runUploadJob(createTestBindings(), [{}]);

    expect(result.failed).toBe(1);
    expect(job).toMatchObject({
      jobName: "upload-all",
      success: false,
      message: "Total: 1, Success: 0, Failed: 1",
    });
  });
});
