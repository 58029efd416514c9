import { describe, it, expect } from "vitest";
import { ReentrancyLock } from "../src/lock.js";
import { CustodyError } from "../src/types.js";
import { rejection } from "./helpers.js";

describe("ReentrancyLock", () => {
  it("holds the lock only while the body runs", async () => {
    const lock = new ReentrancyLock();
    let heldInside = false;

    const result = await lock.run("op", async () => {
      heldInside = lock.held;
      return 42;
    });

    expect(result).toBe(42);
    expect(heldInside).toBe(true);
    expect(lock.held).toBe(false);
  });

  it("refuses a second entry while held", async () => {
    const lock = new ReentrancyLock();
    let inner: unknown;

    await lock.run("outer", async () => {
      inner = await rejection(lock.run("inner", async () => "never"));
    });

    expect(inner).toBeInstanceOf(CustodyError);
    expect(inner).toMatchObject({ code: "REENTRANT_CALL", details: { operation: "inner" } });
    expect(lock.held).toBe(false);
  });

  it("refuses an overlapping call before its body starts", async () => {
    const lock = new ReentrancyLock();
    let secondBodyRan = false;

    const first = lock.run("first", async () => {
      await Promise.resolve();
      return "first";
    });
    const second = lock.run("second", async () => {
      secondBodyRan = true;
    });

    expect(await rejection(second)).toMatchObject({ code: "REENTRANT_CALL" });
    expect(await first).toBe("first");
    expect(secondBodyRan).toBe(false);
  });

  it("releases after the body rejects", async () => {
    const lock = new ReentrancyLock();
    const error = await rejection(
      lock.run("op", async () => {
        throw new Error("boom");
      }),
    );

    expect(error).toEqual(new Error("boom"));
    expect(lock.held).toBe(false);
    await expect(lock.run("again", async () => "ok")).resolves.toBe("ok");
  });

  it("releases after the body throws synchronously", async () => {
    const lock = new ReentrancyLock();
    const error = await rejection(
      lock.run("op", () => {
        throw new Error("sync");
      }),
    );

    expect(error).toEqual(new Error("sync"));
    expect(lock.held).toBe(false);
  });
});
