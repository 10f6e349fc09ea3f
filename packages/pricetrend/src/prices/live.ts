import { z } from "zod";
import { PriceSourceError } from "../errors.js";
import { uniqueIds } from "../ids.js";
import { logger } from "../logger.js";
import type { PriceFetchResult, PriceSource, RawPriceMap } from "../types.js";

const rawPriceMapSchema = z.record(
  z.string(),
  z.record(z.string(), z.union([z.number(), z.string(), z.null()])),
);

export interface LivePriceSourceInput {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export function buildSimplePriceUrl(baseUrl: string, coinIds: readonly string[], vsCurrencies: readonly string[]): URL {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/simple/price`);
  url.searchParams.set("ids", uniqueIds(coinIds).join(","));
  url.searchParams.set("vs_currencies", uniqueIds(vsCurrencies).join(","));
  return url;
}

/**
 * CoinGecko `simple/price` client. Every failure surfaces as a PriceSourceError;
 * falling back is the caller's decision.
 */
export class LivePriceSource implements PriceSource {
  readonly kind = "live" as const;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log = logger.child({ component: "live-price-source" });

  constructor(input: LivePriceSourceInput) {
    this.baseUrl = input.baseUrl;
    this.timeoutMs = input.timeoutMs;
    this.fetchImpl = input.fetchImpl ?? fetch;
  }

  async fetchPrices(coinIds: readonly string[], vsCurrencies: readonly string[]): Promise<PriceFetchResult> {
    const url = buildSimplePriceUrl(this.baseUrl, coinIds, vsCurrencies);
    this.log.info({ ids: url.searchParams.get("ids"), vsCurrencies: url.searchParams.get("vs_currencies") }, "fetching live prices");

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchImpl(url, {
        headers: { accept: "application/json" },
        signal: controller.signal,
      });
      text = await res.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new PriceSourceError("timeout", `price API timeout after ${this.timeoutMs}ms`, { cause: error });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new PriceSourceError("transport", `price API request failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      throw new PriceSourceError("http_status", `price API failed HTTP ${res.status}: ${text.slice(0, 200)}`, {
        status: res.status,
      });
    }

    const prices = parseRawPriceMap(text);
    if (Object.keys(prices).length === 0) {
      throw new PriceSourceError("empty_response", "price API returned empty data");
    }

    this.log.info({ coins: Object.keys(prices) }, "live prices fetched");
    return { source: this.kind, prices };
  }
}

export function parseRawPriceMap(text: string): RawPriceMap {
  if (!text.trim()) return {};

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    throw new PriceSourceError("invalid_body", "price API returned a non-JSON body", { cause: error });
  }

  const parsed = rawPriceMapSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unexpected shape";
    throw new PriceSourceError("invalid_body", `price API body is not a price map (${where})`);
  }
  return parsed.data;
}
