import { describe, it, expect } from "vitest";
import { ExecutorCache } from "../../../../src/core/agents/executor-cache";

describe("ExecutorCache", () => {
  it("creates one instance for concurrent callers on the same key", async () => {
    const cache = new ExecutorCache<{ id: number }>();
    let created = 0;
    const factory = async () => {
      created += 1;
      await new Promise((resolve) => setTimeout(resolve, 10));
      return { id: created };
    };

    const [a, b, c] = await Promise.all([
      cache.getOrCreate("session-1", "main", factory),
      cache.getOrCreate("session-1", "main", factory),
      cache.getOrCreate("session-1", "main", factory),
    ]);

    expect(created).toBe(1);
    expect(a).toBe(b);
    expect(b).toBe(c);
  });

  it("keeps separate instances per session and agent", async () => {
    const cache = new ExecutorCache<string>();

    await cache.getOrCreate("session-1", "main", () => "s1-main");
    await cache.getOrCreate("session-1", "helper", () => "s1-helper");
    const other = await cache.getOrCreate("session-2", "main", () => "s2-main");

    expect(other).toBe("s2-main");
    expect(cache.size).toBe(3);
  });

  it("retries creation after a failure", async () => {
    const cache = new ExecutorCache<string>();

    await expect(
      cache.getOrCreate("session-1", "main", () => {
        throw new Error("misconfigured");
      })
    ).rejects.toThrow("misconfigured");
    await new Promise((resolve) => setTimeout(resolve, 0));

    await expect(cache.getOrCreate("session-1", "main", () => "ok")).resolves.toBe("ok");
  });
});
