import { formatEther } from "ethers";

import { ChainError } from "../chain/errors.js";
import type { LocalChain } from "../chain/LocalChain.js";
import type { Address, ChainSigner } from "../chain/types.js";
import { loadEnv } from "../config/env.js";
import { createChain } from "../config/networks.js";
import { FundMe } from "../contracts/FundMe.js";
import type { AggregatorV3Interface } from "../contracts/interfaces/AggregatorV3Interface.js";
import { MockV3Aggregator } from "../contracts/mocks/MockV3Aggregator.js";
import { RemoteAggregator } from "../contracts/RemoteAggregator.js";
import { HelperConfig } from "./helperConfig.js";
import { isMainModule } from "./utils.js";

export interface DeployFundMeOptions {
  deployer?: ChainSigner;
  helperConfig?: HelperConfig;
}

export interface FundMeDeployment {
  fundMe: FundMe;
  helperConfig: HelperConfig;
}

/** Resolves a feed address to the mock deployed on this chain or, on a fork, the live feed. */
export function attachPriceFeed(chain: LocalChain, address: Address): AggregatorV3Interface {
  const local = chain.getContract(address);
  if (local instanceof MockV3Aggregator) {
    return local;
  }
  if (local === undefined && chain.fork !== undefined) {
    return new RemoteAggregator(address, chain.fork);
  }
  throw new ChainError(`No price feed at ${address} on chain ${chain.chainId}`);
}

export async function deployFundMe(chain: LocalChain, options: DeployFundMeOptions = {}): Promise<FundMeDeployment> {
  const helperConfig = options.helperConfig ?? new HelperConfig(chain);
  const deployer = options.deployer ?? chain.getSigners()[0];

  const { priceFeed } = await helperConfig.getActiveNetworkConfig();
  const feed = attachPriceFeed(chain, priceFeed);
  const fundMe = await chain.deploy(deployer, (context) => new FundMe(context, feed));
  return { fundMe, helperConfig };
}

async function main() {
  const env = loadEnv();
  const networkName = process.argv[2] ?? env.NETWORK;
  const chain = createChain(networkName, env);
  const [deployer] = chain.getSigners();

  const { fundMe } = await deployFundMe(chain, { deployer });

  console.log("Network:", networkName, `(chainId ${chain.chainId})`);
  console.log("Deployer:", deployer.address);
  console.log("Price feed:", fundMe.getPriceFeed());
  console.log("Price feed version:", (await fundMe.getVersion()).toString());
  console.log("FundMe:", fundMe.address);
  console.log("Minimum contribution:", formatEther(FundMe.MINIMUM_USD), "USD");
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
