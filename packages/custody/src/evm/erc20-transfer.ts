/**
 * AssetTransferProtocol over ERC-20 contracts.
 *
 * Every write is sent from the custody account, so the account must be
 * the spender of a pull, the owner of an authorization and the sender of
 * a transfer. A simulated `false` return skips submission.
 */

import { parseAbi, type Hash } from "viem";
import type { Address } from "@strongbox/types";
import type { AssetTransferProtocol } from "../ports.js";
import type { EvmConnection } from "./connection.js";

const ERC20_ABI = parseAbi([
  "function transferFrom(address from, address to, uint256 amount) returns (bool)",
  "function approve(address spender, uint256 amount) returns (bool)",
  "function transfer(address to, uint256 amount) returns (bool)",
  "function balanceOf(address owner) view returns (uint256)",
]);

export class Erc20TransferProtocol implements AssetTransferProtocol {
  constructor(private readonly connection: EvmConnection) {}

  async pull(asset: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    this.requireAccount(to, "pull recipient");
    const { publicClient, walletClient, account } = this.connection.clients();
    const { request, result } = await publicClient.simulateContract({
      account,
      address: asset,
      abi: ERC20_ABI,
      functionName: "transferFrom",
      args: [from, to, amount],
    });
    return result && this.submitted(await walletClient.writeContract(request));
  }

  async authorize(asset: Address, owner: Address, spender: Address, amount: bigint): Promise<boolean> {
    this.requireAccount(owner, "authorization owner");
    const { publicClient, walletClient, account } = this.connection.clients();
    const { request, result } = await publicClient.simulateContract({
      account,
      address: asset,
      abi: ERC20_ABI,
      functionName: "approve",
      args: [spender, amount],
    });
    return result && this.submitted(await walletClient.writeContract(request));
  }

  async transfer(asset: Address, from: Address, to: Address, amount: bigint): Promise<boolean> {
    this.requireAccount(from, "transfer sender");
    const { publicClient, walletClient, account } = this.connection.clients();
    const { request, result } = await publicClient.simulateContract({
      account,
      address: asset,
      abi: ERC20_ABI,
      functionName: "transfer",
      args: [to, amount],
    });
    return result && this.submitted(await walletClient.writeContract(request));
  }

  async balanceOf(asset: Address, holder: Address): Promise<bigint> {
    return this.connection.clients().publicClient.readContract({
      address: asset,
      abi: ERC20_ABI,
      functionName: "balanceOf",
      args: [holder],
    });
  }

  private submitted(hash: Hash): Promise<boolean> {
    return this.connection.confirm(hash);
  }

  private requireAccount(address: Address, role: string): void {
    if (address.toLowerCase() !== this.connection.address) {
      throw new Error(`Erc20TransferProtocol: ${role} ${address} is not the custody account`);
    }
  }
}
