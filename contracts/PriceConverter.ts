import { CustomError } from "../chain/errors.js";
import type { AggregatorV3Interface } from "./interfaces/AggregatorV3Interface.js";

const PRECISION = 18;
const ONE = 10n ** BigInt(PRECISION);

export class InvalidPriceError extends CustomError {
  constructor(
    feed: string,
    readonly answer: bigint
  ) {
    super(feed, "PriceConverter__InvalidPrice", [answer]);
  }
}

/** Latest ETH/USD answer of `feed`, scaled to 18 decimals. */
export async function getPrice(feed: AggregatorV3Interface): Promise<bigint> {
  const [{ answer }, decimals] = await Promise.all([feed.latestRoundData(), feed.decimals()]);
  if (answer <= 0n) {
    throw new InvalidPriceError(feed.address, answer);
  }
  return decimals <= PRECISION
    ? answer * 10n ** BigInt(PRECISION - decimals)
    : answer / 10n ** BigInt(decimals - PRECISION);
}

/** USD value, with 18 decimals, of `ethAmount` wei. */
export async function getConversionRate(ethAmount: bigint, feed: AggregatorV3Interface): Promise<bigint> {
  const ethPrice = await getPrice(feed);
  return (ethPrice * ethAmount) / ONE;
}
