import { uniqueIds } from "../ids.js";
import { logger } from "../logger.js";
import type { PriceFetchResult, PriceSource, RawPriceMap } from "../types.js";

export type PriceBand = { min: number; max: number };

export const COIN_PRICE_BANDS: Readonly<Record<string, PriceBand>> = {
  bitcoin: { min: 25_000, max: 70_000 },
  ethereum: { min: 1_500, max: 4_000 },
};

export const GENERIC_PRICE_BAND: PriceBand = { min: 1, max: 100 };

export function priceBandFor(coin: string): PriceBand {
  return COIN_PRICE_BANDS[coin] ?? GENERIC_PRICE_BAND;
}

export class SyntheticPriceSource implements PriceSource {
  readonly kind = "synthetic" as const;

  constructor(private readonly random: () => number = Math.random) {}

  // Same band for every currency of a coin.
  async fetchPrices(coinIds: readonly string[], vsCurrencies: readonly string[]): Promise<PriceFetchResult> {
    const currencies = uniqueIds(vsCurrencies);
    const prices: RawPriceMap = {};

    for (const coin of uniqueIds(coinIds)) {
      const band = priceBandFor(coin);
      const row: Record<string, number> = {};
      for (const currency of currencies) {
        row[currency] = band.min + this.random() * (band.max - band.min);
      }
      prices[coin] = row;
    }

    logger.debug({ component: "synthetic-price-source", coins: Object.keys(prices) }, "simulated prices");
    return { source: this.kind, prices };
  }
}
