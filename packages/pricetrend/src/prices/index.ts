import type { PipelineConfig } from "../config.js";
import type { PriceSource } from "../types.js";
import { FallbackPriceSource } from "./fallback.js";
import { LivePriceSource } from "./live.js";
import { SyntheticPriceSource } from "./synthetic.js";

export { FallbackPriceSource } from "./fallback.js";
export { LivePriceSource, buildSimplePriceUrl, parseRawPriceMap } from "./live.js";
export { SyntheticPriceSource, priceBandFor, COIN_PRICE_BANDS, GENERIC_PRICE_BAND } from "./synthetic.js";

export function createPriceSource(
  config: Pick<PipelineConfig, "priceSource" | "priceApiUrl" | "priceApiTimeoutMs">,
  fetchImpl?: typeof fetch,
): PriceSource {
  const synthetic = new SyntheticPriceSource();
  if (config.priceSource === "synthetic") return synthetic;

  const live = new LivePriceSource({
    baseUrl: config.priceApiUrl,
    timeoutMs: config.priceApiTimeoutMs,
    ...(fetchImpl ? { fetchImpl } : {}),
  });
  return new FallbackPriceSource(live, synthetic);
}
