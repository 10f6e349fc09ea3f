import { describe, expect, it, vi } from "vitest";
import { derivePriceRows, normalize, toFiniteNumber, USD_PER_INR, usdValue } from "../src/normalize.js";
import type { RawPriceMap } from "../src/types.js";

const T = new Date("2026-01-01T10:00:00.000Z");

describe("normalize", () => {
  it("keeps only the usd row of a usd+inr quote", () => {
    const rows = normalize({ bitcoin: { usd: 50000, inr: 4150000 } }, () => T);

    expect(rows).toEqual([
      { timestamp: T, coin: "bitcoin", currency: "usd", price: 50000, priceUsd: 50000 },
    ]);
  });

  it("returns null for null, undefined and empty maps", () => {
    expect(normalize(null)).toBeNull();
    expect(normalize(undefined)).toBeNull();
    expect(normalize({})).toBeNull();
  });

  it("stamps every row of one call with a single instant", () => {
    const now = vi.fn(() => T);
    const rows = normalize(
      { bitcoin: { usd: 30000 }, ethereum: { usd: 2000 }, solana: { usd: 150 } },
      now,
    );

    expect(now).toHaveBeenCalledTimes(1);
    expect(rows?.map((r) => r.timestamp)).toEqual([T, T, T]);
  });

  it("never returns inr or other non-usd rows", () => {
    const inputs: RawPriceMap[] = [
      { bitcoin: { inr: 100 } },
      { bitcoin: { eur: 27000, inr: 2000000, usd: 30000 }, ethereum: { inr: 160000 } },
      { dogecoin: { usd: 0.1, gbp: 0.08 } },
    ];

    for (const raw of inputs) {
      const rows = normalize(raw, () => T) ?? [];
      for (const row of rows) {
        expect(row.currency).toBe("usd");
        expect(Number.isFinite(row.priceUsd)).toBe(true);
      }
    }
    expect(normalize({ bitcoin: { inr: 100 } }, () => T)).toEqual([]);
  });

  it("coerces numeric strings and drops unreadable prices", () => {
    const rows = normalize({ bitcoin: { usd: "123.5" }, ethereum: { usd: "n/a" }, solana: { usd: null } }, () => T);

    expect(rows).toEqual([
      { timestamp: T, coin: "bitcoin", currency: "usd", price: 123.5, priceUsd: 123.5 },
    ]);
  });
});

describe("derivePriceRows", () => {
  it("converts inr at the fixed rate before any filtering", () => {
    const rows = derivePriceRows({ bitcoin: { usd: 50000, inr: 4150000 } }, T);

    expect(rows).toHaveLength(2);
    const inr = rows.find((r) => r.currency === "inr");
    expect(inr?.price).toBe(4150000);
    expect(inr?.priceUsd).toBe(4150000 / 83.0);
    expect(inr?.priceUsd).toBe(50000);
  });

  it("leaves currencies without a known rate unpriced", () => {
    const rows = derivePriceRows({ ethereum: { eur: 1800 } }, T);
    expect(rows).toEqual([{ timestamp: T, coin: "ethereum", currency: "eur", price: 1800, priceUsd: null }]);
  });

  it("produces frozen rows", () => {
    const [row] = derivePriceRows({ bitcoin: { usd: 1 } }, T);
    expect(Object.isFrozen(row)).toBe(true);
  });
});

describe("usdValue / toFiniteNumber", () => {
  it("maps currencies to usd", () => {
    expect(USD_PER_INR).toBe(83);
    expect(usdValue("usd", 10)).toBe(10);
    expect(usdValue("inr", 166)).toBe(2);
    expect(usdValue("jpy", 1000)).toBeNull();
  });

  it("reads finite numbers only", () => {
    expect(toFiniteNumber(42)).toBe(42);
    expect(toFiniteNumber(" 7.25 ")).toBe(7.25);
    expect(toFiniteNumber("")).toBeNull();
    expect(toFiniteNumber(Number.NaN)).toBeNull();
    expect(toFiniteNumber(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toFiniteNumber(null)).toBeNull();
    expect(toFiniteNumber(undefined)).toBeNull();
  });
});
