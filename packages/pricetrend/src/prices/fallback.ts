import { describeError, errorCategory } from "../errors.js";
import { logger } from "../logger.js";
import type { PriceFetchResult, PriceSource } from "../types.js";

export class FallbackPriceSource implements PriceSource {
  private readonly log = logger.child({ component: "fallback-price-source" });

  constructor(
    private readonly primary: PriceSource,
    private readonly fallback: PriceSource,
  ) {}

  get kind() {
    return this.primary.kind;
  }

  async fetchPrices(coinIds: readonly string[], vsCurrencies: readonly string[]): Promise<PriceFetchResult> {
    try {
      const result = await this.primary.fetchPrices(coinIds, vsCurrencies);
      if (Object.keys(result.prices).length > 0) return result;
      this.log.warn({ primary: this.primary.kind, fallback: this.fallback.kind }, "primary price source returned no data, using fallback data");
    } catch (error) {
      this.log.warn(
        { category: errorCategory(error), err: describeError(error), fallback: this.fallback.kind },
        "primary price source failed, using fallback data",
      );
    }
    return this.fallback.fetchPrices(coinIds, vsCurrencies);
  }
}
