import { describe, it, expect } from "vitest";
import { withDeadline } from "../../../../src/core/concurrency";

class SlowError extends Error {}

describe("withDeadline", () => {
  it("resolves with the task result when it finishes in time", async () => {
    const result = await withDeadline(
      1_000,
      async () => "done",
      () => new SlowError("too slow")
    );

    expect(result).toBe("done");
  });

  it("rejects with the timeout error and aborts the signal", async () => {
    let observed: AbortSignal | undefined;

    const pending = withDeadline(
      10,
      (signal) => {
        observed = signal;
        return new Promise<string>(() => undefined);
      },
      () => new SlowError("too slow")
    );

    await expect(pending).rejects.toBeInstanceOf(SlowError);
    expect(observed?.aborted).toBe(true);
    expect(observed?.reason).toBeInstanceOf(SlowError);
  });

  it("propagates task failures unchanged", async () => {
    await expect(
      withDeadline(
        1_000,
        async () => {
          throw new Error("task failed");
        },
        () => new SlowError("too slow")
      )
    ).rejects.toThrow("task failed");
  });

  it("runs without a deadline when the timeout is zero", async () => {
    const result = await withDeadline(
      0,
      (signal) =>
        new Promise<boolean>((resolve) => setTimeout(() => resolve(signal.aborted), 20)),
      () => new SlowError("too slow")
    );

    expect(result).toBe(false);
  });
});
