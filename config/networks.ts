import { JsonRpcProvider } from "ethers";

import { LocalChain } from "../chain/LocalChain.js";
import { createLogger } from "../chain/logger.js";
import { ConfigError, type Env } from "./env.js";

export type NetworkConfig =
  | { readonly type: "local"; readonly chainId: bigint }
  | { readonly type: "fork"; readonly chainId: bigint; readonly rpcUrlKey: "SEPOLIA_RPC_URL" | "MAINNET_RPC_URL" };

export const networks = {
  hardhat: { type: "local", chainId: 31337n },
  sepolia: { type: "fork", chainId: 11155111n, rpcUrlKey: "SEPOLIA_RPC_URL" },
  mainnet: { type: "fork", chainId: 1n, rpcUrlKey: "MAINNET_RPC_URL" },
} as const satisfies Record<string, NetworkConfig>;

export type NetworkName = keyof typeof networks;

export function isNetworkName(name: string): name is NetworkName {
  return Object.hasOwn(networks, name);
}

/**
 * Creates the chain for a network profile. Live profiles run locally on top of
 * a fork of the network, so contracts already deployed there (price feeds) are
 * read over RPC.
 */
export function createChain(name: string, env: Env): LocalChain {
  if (!isNetworkName(name)) {
    throw new ConfigError(`Unknown network "${name}". Expected one of: ${Object.keys(networks).join(", ")}`);
  }
  const network: NetworkConfig = networks[name];
  const logger = createLogger(env.LOG_LEVEL).child({ network: name });

  if (network.type === "local") {
    return new LocalChain({ chainId: network.chainId, logger });
  }

  const url = env[network.rpcUrlKey];
  if (url === undefined) {
    throw new ConfigError(`Network "${name}" needs ${network.rpcUrlKey} to be set`);
  }
  const provider = new JsonRpcProvider(url, network.chainId, { staticNetwork: true });
  return new LocalChain({ chainId: network.chainId, fork: provider, logger });
}
