/**
 * Test helpers for @strongbox/node.
 *
 * Provides a test app factory that creates a Hono app with all
 * middleware and routes over sandbox collaborators, but no HTTP server.
 */

import type { Address } from "@strongbox/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { CustodyServiceConfig } from "../src/services/custody-service.js";

export const CUSTODY: Address = "0x1111111111111111111111111111111111111111";
export const OWNER: Address = "0x2222222222222222222222222222222222222222";
export const SETTLEMENT: Address = "0x3333333333333333333333333333333333333333";
export const WRAPPER: Address = "0x4444444444444444444444444444444444444444";
export const EXCHANGE: Address = "0x5555555555555555555555555555555555555555";
export const TOKEN: Address = "0x6666666666666666666666666666666666666666";
export const ALICE: Address = "0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa";

/** 2026-01-01T00:00:00.000Z */
export const NOW = Date.UTC(2026, 0, 1);

/**
 * Capacity 10,000, ceiling 1,000; 1 native unit → 2,000, 1 TOKEN → 1/2.
 */
export function testServiceConfig(): CustodyServiceConfig {
  return {
    custody: {
      custody: CUSTODY,
      owner: OWNER,
      settlement: { address: SETTLEMENT, symbol: "USDC", decimals: 6 },
      nativeWrapper: WRAPPER,
      capacity: 10_000n,
      withdrawalCeiling: 1_000n,
      now: () => NOW,
    },
    exchange: EXCHANGE,
    rates: [
      { asset: WRAPPER, numerator: 2_000n, denominator: 1n },
      { asset: TOKEN, numerator: 1n, denominator: 2n },
    ],
    liquidity: 1_000_000_000n,
  };
}

/**
 * Create a test app in unsecured mode.
 */
export function createTestApp(overrides: Partial<CreateAppOptions> = {}): AppInstance {
  return createApp({ serviceConfig: testServiceConfig(), ...overrides });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** Headers naming the caller in unsecured mode. */
export function callerHeaders(address: string): Record<string, string> {
  return { "X-Caller-Address": address };
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
