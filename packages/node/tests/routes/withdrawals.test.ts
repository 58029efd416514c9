/**
 * Tests for POST /api/v1/withdrawals and GET /api/v1/account.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ALICE, callerHeaders, createTestApp, jsonRequest } from "../setup.js";
import type { ErrorBody } from "../setup.js";
import type { AppInstance } from "../../src/app.js";
import type { AmountDto, CustodyRecordDto } from "../../src/types/dto.js";

let instance: AppInstance;

/** Deposit 3 native units for ALICE: 6,000 settlement units credited. */
async function fundAlice(): Promise<void> {
  instance.service.mint("native", ALICE, 3n);
  await instance.service.custody.depositNative(ALICE, 3n);
}

beforeEach(async () => {
  instance = createTestApp();
  await fundAlice();
});

describe("POST /api/v1/withdrawals", () => {
  it("releases settlement currency and returns the record", async () => {
    const { app, service } = instance;

    const res = await app.request(
      jsonRequest("/api/v1/withdrawals", "POST", { amount: "500" }, callerHeaders(ALICE)),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: CustodyRecordDto };
    expect(body.data).toEqual({
      kind: "withdrawal",
      sequence: 2,
      timestamp: "2026-01-01T00:00:00.000Z",
      user: ALICE,
      amount: "500",
    });
    expect(service.custody.balanceOf(ALICE)).toBe(5500n);
    expect(service.holdings(ALICE).settlement).toBe(500n);
  });

  it("returns 422 above the withdrawal ceiling", async () => {
    const { app, service } = instance;

    const res = await app.request(
      jsonRequest("/api/v1/withdrawals", "POST", { amount: "1001" }, callerHeaders(ALICE)),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "WITHDRAWAL_CEILING_EXCEEDED",
      message: "Requested 1001 exceeds the per-call withdrawal ceiling 1000",
      details: { ceiling: "1000", requested: "1001" },
    });
    expect(service.custody.balanceOf(ALICE)).toBe(6000n);
  });

  it("returns 422 when the balance does not cover the amount", async () => {
    const { app } = instance;
    const bob = "0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb";

    const res = await app.request(
      jsonRequest("/api/v1/withdrawals", "POST", { amount: "1" }, callerHeaders(bob)),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_BALANCE");
    expect(body.error.details).toEqual({ available: "0", requested: "1" });
  });

  it("returns 400 for a zero amount", async () => {
    const { app } = instance;

    const res = await app.request(
      jsonRequest("/api/v1/withdrawals", "POST", { amount: "0" }, callerHeaders(ALICE)),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("ZERO_AMOUNT");
  });

  it("returns 400 for a missing amount", async () => {
    const { app } = instance;

    const res = await app.request(
      jsonRequest("/api/v1/withdrawals", "POST", {}, callerHeaders(ALICE)),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "amount", message: "Required" }],
    });
  });
});

describe("GET /api/v1/account", () => {
  it("returns the caller's balance in units and money", async () => {
    const { app } = instance;

    const res = await app.request(jsonRequest("/api/v1/account", "GET", undefined, callerHeaders(ALICE)));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { address: string; balance: AmountDto } };
    expect(body.data).toEqual({
      address: ALICE,
      balance: {
        units: "6000",
        money: { amount: "0.006000", currency: "USDC", decimals: 6 },
      },
    });
  });

  it("lowercases a checksummed caller header", async () => {
    const { app } = instance;

    const res = await app.request(
      jsonRequest(
        "/api/v1/account",
        "GET",
        undefined,
        callerHeaders("0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed"),
      ),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { address: string; balance: AmountDto } };
    expect(body.data.address).toBe("0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed");
    expect(body.data.balance.units).toBe("0");
  });
});
