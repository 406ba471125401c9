import { describe, expect, it, vi } from "vitest";
import { AuditCache, cacheKey } from "./cache";

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("cacheKey", () => {
  it("separates profiles for the same URL", () => {
    expect(cacheKey("full", "https://example.com/")).toBe("full|https://example.com/");
    expect(cacheKey("summary", "https://example.com/")).not.toBe(cacheKey("full", "https://example.com/"));
  });
});

describe("AuditCache", () => {
  it("runs one computation for concurrent callers of the same key", async () => {
    const cache = new AuditCache<string>();
    const pending = deferred<string>();
    const compute = vi.fn(() => pending.promise);

    const first = cache.getOrCompute("k", 1_000, compute);
    const second = cache.getOrCompute("k", 1_000, compute);
    pending.resolve("report");

    await expect(Promise.all([first, second])).resolves.toEqual(["report", "report"]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("serves fresh entries and recomputes once the TTL has passed", async () => {
    let now = 0;
    const cache = new AuditCache<number>(() => now);
    let calls = 0;
    const compute = async () => ++calls;

    expect(await cache.getOrCompute("k", 1_000, compute)).toBe(1);
    now = 999;
    expect(await cache.getOrCompute("k", 1_000, compute)).toBe(1);
    now = 1_000;
    expect(cache.peek("k")).toBeNull();
    expect(await cache.getOrCompute("k", 1_000, compute)).toBe(2);
    expect(cache.peek("k")).toBe(2);
  });

  it("rejects every waiter on failure and stores nothing", async () => {
    const cache = new AuditCache<string>();
    const pending = deferred<string>();

    const first = cache.getOrCompute("k", 1_000, () => pending.promise);
    const second = cache.getOrCompute("k", 1_000, () => Promise.resolve("unused"));
    pending.reject(new Error("seed unreachable"));

    await expect(first).rejects.toThrow("seed unreachable");
    await expect(second).rejects.toThrow("seed unreachable");
    expect(cache.size).toBe(0);

    await expect(cache.getOrCompute("k", 1_000, async () => "retried")).resolves.toBe("retried");
  });

  it("contains a compute function that throws synchronously", async () => {
    const cache = new AuditCache<string>();
    const boom = () => {
      throw new Error("boom");
    };

    await expect(cache.getOrCompute("k", 1_000, boom)).rejects.toThrow("boom");
    await expect(cache.getOrCompute("k", 1_000, async () => "ok")).resolves.toBe("ok");
  });

  it("keeps different keys independent", async () => {
    const cache = new AuditCache<string>();
    const compute = vi.fn(async () => "value");

    await Promise.all([cache.getOrCompute("a", 1_000, compute), cache.getOrCompute("b", 1_000, compute)]);

    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(2);
  });

  it("hands out copies so callers cannot change the cached value", async () => {
    const cache = new AuditCache<{ title: string }>();
    const pending = deferred<{ title: string }>();

    const first = cache.getOrCompute("k", 1_000, () => pending.promise);
    const joined = cache.getOrCompute("k", 1_000, () => Promise.resolve({ title: "unused" }));
    pending.resolve({ title: "Website Audit" });

    const [a, b] = await Promise.all([first, joined]);
    a.title = "changed";
    b.title = "changed too";

    const hit = await cache.getOrCompute("k", 1_000, async () => ({ title: "recomputed" }));
    expect(hit.title).toBe("Website Audit");
    hit.title = "changed again";
    expect(cache.peek("k")).toEqual({ title: "Website Audit" });
  });

  it("does not let a computation started before clear() touch newer state", async () => {
    const cache = new AuditCache<string>();
    const stale = deferred<string>();
    const current = deferred<string>();
    const compute = vi.fn(() => current.promise);

    const before = cache.getOrCompute("k", 1_000, () => stale.promise);
    cache.clear();
    const after = cache.getOrCompute("k", 1_000, compute);

    stale.resolve("stale");
    await expect(before).resolves.toBe("stale");
    expect(cache.size).toBe(0);

    const joined = cache.getOrCompute("k", 1_000, compute);
    current.resolve("fresh");

    await expect(Promise.all([after, joined])).resolves.toEqual(["fresh", "fresh"]);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.peek("k")).toBe("fresh");
  });
});
