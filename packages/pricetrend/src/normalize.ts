import type { Observation, ObservationTable, RawPrice, RawPriceMap, UsdObservation } from "./types.js";

export const USD_PER_INR = 83.0;

export function toFiniteNumber(value: RawPrice | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function usdValue(currency: string, price: number): number | null {
  if (currency === "usd") return price;
  // Fixed rate. INR rows never survive the USD filter in normalize().
  if (currency === "inr") return price / USD_PER_INR;
  return null;
}

/** Every (coin, currency) pair with a readable price, before the USD filter. */
export function derivePriceRows(raw: RawPriceMap, at: Date): Observation[] {
  const rows: Observation[] = [];
  for (const [coin, currencies] of Object.entries(raw)) {
    for (const [currency, rawPrice] of Object.entries(currencies)) {
      const price = toFiniteNumber(rawPrice);
      if (price === null) continue;
      rows.push(
        Object.freeze({
          timestamp: at,
          coin,
          currency,
          price,
          priceUsd: toFiniteNumber(usdValue(currency, price)),
        }),
      );
    }
  }
  return rows;
}

export function isUsdObservation(row: Observation): row is UsdObservation {
  return row.currency === "usd" && row.priceUsd !== null && Number.isFinite(row.priceUsd);
}

export function normalize(
  raw: RawPriceMap | null | undefined,
  now: () => Date = () => new Date(),
): ObservationTable | null {
  if (!raw || Object.keys(raw).length === 0) return null;
  const timestamp = now();
  return derivePriceRows(raw, timestamp).filter(isUsdObservation);
}
