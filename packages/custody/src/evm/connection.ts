/**
 * viem clients for one custody account on an EVM chain.
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  type Chain,
  type Hash,
  type Hex,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { arbitrum, base, mainnet, optimism, polygon, sepolia } from "viem/chains";
import type { Address } from "@strongbox/types";

const VIEM_CHAINS: Record<number, Chain> = {
  1: mainnet,
  11155111: sepolia,
  8453: base,
  42161: arbitrum,
  10: optimism,
  137: polygon,
};

export interface EvmConnectionConfig {
  readonly chainId: number;
  readonly rpcUrl: string;

  /** Key of the custody account that signs every transaction */
  readonly privateKey: Hex;

  readonly timeoutMs?: number | undefined;
}

export interface EvmClients {
  readonly publicClient: PublicClient<HttpTransport, Chain>;
  readonly walletClient: WalletClient<HttpTransport, Chain, PrivateKeyAccount>;
  readonly account: PrivateKeyAccount;
}

export class EvmConnection {
  readonly chain: Chain;
  readonly account: PrivateKeyAccount;
  private readonly config: EvmConnectionConfig;
  private _clients: EvmClients | null = null;

  constructor(config: EvmConnectionConfig) {
    const chain = VIEM_CHAINS[config.chainId];
    if (!chain) {
      throw new Error(
        `EvmConnection: unsupported chain ${String(config.chainId)}. ` +
          `Supported: ${Object.keys(VIEM_CHAINS).join(", ")}`,
      );
    }
    this.chain = chain;
    this.config = config;
    this.account = privateKeyToAccount(config.privateKey);
  }

  /** Custody address: the signing account, lowercased. */
  get address(): Address {
    return `0x${this.account.address.slice(2).toLowerCase()}`;
  }

  get connected(): boolean {
    return this._clients !== null;
  }

  connect(): void {
    const transport = http(this.config.rpcUrl, { timeout: this.config.timeoutMs ?? 30_000 });
    this._clients = {
      publicClient: createPublicClient({ chain: this.chain, transport }),
      walletClient: createWalletClient({ account: this.account, chain: this.chain, transport }),
      account: this.account,
    };
  }

  disconnect(): void {
    this._clients = null;
  }

  clients(): EvmClients {
    if (!this._clients) {
      throw new Error("EvmConnection: not connected. Call connect() first.");
    }
    return this._clients;
  }

  /**
   * Wait for a transaction and report whether it succeeded.
   */
  async confirm(hash: Hash): Promise<boolean> {
    const receipt = await this.clients().publicClient.waitForTransactionReceipt({ hash });
    return receipt.status === "success";
  }
}
