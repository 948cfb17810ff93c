import type { LocalChain } from "../chain/LocalChain.js";
import type { Address, ChainSigner } from "../chain/types.js";
import { MockV3Aggregator } from "../contracts/mocks/MockV3Aggregator.js";

export const DECIMALS = 8;
export const INITIAL_PRICE = 2000n * 10n ** 8n;

export interface NetworkConfig {
  readonly priceFeed: Address;
}

/** ETH/USD feeds of the live networks, by chain id. */
export const LIVE_NETWORK_CONFIGS: ReadonlyMap<bigint, NetworkConfig> = new Map([
  [11155111n, { priceFeed: "0x694AA1769357215DE4FAC081bf1f309aDC325306" }],
  [1n, { priceFeed: "0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419" }],
]);

/**
 * Picks the price feed for the chain: a fixed address on live networks, a
 * freshly deployed mock everywhere else. The mock is deployed at most once.
 */
export class HelperConfig {
  private localConfig?: Promise<NetworkConfig>;

  constructor(
    private readonly chain: LocalChain,
    private readonly configs: ReadonlyMap<bigint, NetworkConfig> = LIVE_NETWORK_CONFIGS,
    private readonly deployer: ChainSigner = chain.getSigners()[0]
  ) {}

  async getActiveNetworkConfig(): Promise<NetworkConfig> {
    return this.configs.get(this.chain.chainId) ?? this.getOrCreateLocalConfig();
  }

  getOrCreateLocalConfig(): Promise<NetworkConfig> {
    this.localConfig ??= this.deployMockPriceFeed().catch((error: unknown) => {
      this.localConfig = undefined;
      throw error;
    });
    return this.localConfig;
  }

  private async deployMockPriceFeed(): Promise<NetworkConfig> {
    const mockPriceFeed = await this.chain.deploy(
      this.deployer,
      (context) => new MockV3Aggregator(context, DECIMALS, INITIAL_PRICE)
    );
    return { priceFeed: mockPriceFeed.address };
  }
}
