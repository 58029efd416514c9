/**
 * ExchangeAdapter over a Uniswap-V2-style router.
 *
 * Each conversion is simulated first, then submitted from the custody
 * account. A reverted receipt rejects.
 */

import { parseAbi, type Hash } from "viem";
import type { Address } from "@strongbox/types";
import type { ConversionRequest, ExchangeAdapter } from "../ports.js";
import type { EvmConnection } from "./connection.js";

const ROUTER_ABI = parseAbi([
  "function swapExactTokensForTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline) returns (uint256[] amounts)",
  "function swapExactETHForTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable returns (uint256[] amounts)",
]);

export class RouterExchangeAdapter implements ExchangeAdapter {
  readonly address: Address;
  private readonly connection: EvmConnection;

  constructor(router: Address, connection: EvmConnection) {
    this.address = router;
    this.connection = connection;
  }

  async convertExactInput(request: ConversionRequest): Promise<bigint> {
    const { publicClient, walletClient, account } = this.connection.clients();
    const path = [...request.path];

    let hash: Hash;
    let amounts: readonly bigint[];
    if (request.value !== undefined) {
      const simulated = await publicClient.simulateContract({
        account,
        address: this.address,
        abi: ROUTER_ABI,
        functionName: "swapExactETHForTokens",
        args: [request.minAmountOut, path, request.recipient, request.deadline],
        value: request.value,
      });
      amounts = simulated.result;
      hash = await walletClient.writeContract(simulated.request);
    } else {
      const simulated = await publicClient.simulateContract({
        account,
        address: this.address,
        abi: ROUTER_ABI,
        functionName: "swapExactTokensForTokens",
        args: [request.amountIn, request.minAmountOut, path, request.recipient, request.deadline],
      });
      amounts = simulated.result;
      hash = await walletClient.writeContract(simulated.request);
    }

    if (!(await this.connection.confirm(hash))) {
      throw new Error(`Router swap reverted: ${hash}`);
    }
    const out = amounts[amounts.length - 1];
    if (out === undefined) {
      throw new Error(`Router returned no amounts: ${hash}`);
    }
    return out;
  }
}
