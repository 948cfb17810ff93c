import { formatEther, parseEther } from "ethers";

import type { ChainSigner, TransactionReceipt } from "../chain/types.js";
import { loadEnv } from "../config/env.js";
import { createChain } from "../config/networks.js";
import type { FundMe } from "../contracts/FundMe.js";
import { deployFundMe } from "./deploy.js";
import { isMainModule } from "./utils.js";

export const SEND_VALUE = parseEther("0.1");

export function fundFundMe(fundMe: FundMe, funder: ChainSigner, value = SEND_VALUE): Promise<TransactionReceipt> {
  return fundMe.connect(funder).fund({ value });
}

export function withdrawFundMe(fundMe: FundMe, owner: ChainSigner): Promise<TransactionReceipt> {
  return fundMe.connect(owner).withdraw();
}

async function main() {
  const env = loadEnv();
  const networkName = process.argv[2] ?? env.NETWORK;
  const chain = createChain(networkName, env);
  const [owner, alice, bob] = chain.getSigners();

  const { fundMe } = await deployFundMe(chain, { deployer: owner });
  console.log("FundMe:", fundMe.address);

  for (const funder of [alice, bob]) {
    const receipt = await fundFundMe(fundMe, funder);
    console.log(`Funded with ${formatEther(SEND_VALUE)} ETH from ${funder.address} in block ${receipt.blockNumber}`);
  }
  console.log("Contract balance:", formatEther(chain.getBalance(fundMe.address)), "ETH");

  const ownerBefore = chain.getBalance(owner.address);
  const receipt = await withdrawFundMe(fundMe, owner);
  console.log(`Withdrawn in block ${receipt.blockNumber}`);
  console.log("Owner gained:", formatEther(chain.getBalance(owner.address) - ownerBefore), "ETH");
  console.log("Funders left:", fundMe.getFundersCount());
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
