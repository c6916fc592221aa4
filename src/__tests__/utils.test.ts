import { KeyedLock } from "../utils/keyed-lock.js";
import { RetryExhaustedError, withRetry } from "../utils/retry.js";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = jest.fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error("once"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { attempts: 3, delayMs: 0 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
  });

  it("gives up after the configured attempts with the last error", async () => {
    const onRetry = jest.fn();
    const last = new Error("third");
    const fn = jest.fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(last);

    const err = await withRetry(fn, { attempts: 3, delayMs: 0, onRetry }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetryExhaustedError);
    expect(err).toMatchObject({ attempts: 3, lastError: last });
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it("doubles the delay between attempts", async () => {
    const timeout = jest.spyOn(global, "setTimeout");
    try {
      const fn = async (attempt: number): Promise<string> => {
        if (attempt < 4) throw new Error("retry");
        return "done";
      };

      await expect(withRetry(fn, { attempts: 4, delayMs: 2 })).resolves.toBe("done");
      expect(timeout.mock.calls.map((call) => call[1])).toEqual([2, 4, 8]);
    } finally {
      timeout.mockRestore();
    }
  });
});

describe("KeyedLock", () => {
  it("serializes sections with the same key", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("k", async () => {
        order.push("a:start");
        await new Promise((r) => setTimeout(r, 10));
        order.push("a:end");
      }),
      lock.run("k", async () => {
        order.push("b:start");
        order.push("b:end");
      }),
    ]);

    expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(lock.size).toBe(0);
  });

  it("does not block different keys", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];

    await Promise.all([
      lock.run("slow", async () => {
        await new Promise((r) => setTimeout(r, 10));
        order.push("slow");
      }),
      lock.run("fast", async () => {
        order.push("fast");
      }),
    ]);

    expect(order).toEqual(["fast", "slow"]);
  });

  it("releases the key when the section throws", async () => {
    const lock = new KeyedLock();
    await expect(lock.run("k", async () => {
      throw new Error("inside");
    })).rejects.toThrow("inside");

    await expect(lock.run("k", async () => "next")).resolves.toBe("next");
    expect(lock.size).toBe(0);
  });
});
