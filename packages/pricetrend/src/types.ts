export type RawPrice = number | string | null;

/** coin id -> currency code -> price, as returned by the price API */
export type RawPriceMap = Record<string, Record<string, RawPrice>>;

export type PriceSourceKind = "live" | "synthetic";

export type PriceFetchResult = {
  source: PriceSourceKind;
  prices: RawPriceMap;
};

export interface PriceSource {
  readonly kind: PriceSourceKind;
  fetchPrices(coinIds: readonly string[], vsCurrencies: readonly string[]): Promise<PriceFetchResult>;
}

export type Observation = {
  readonly timestamp: Date;
  readonly coin: string;
  readonly currency: string;
  readonly price: number;
  readonly priceUsd: number | null;
};

export type UsdObservation = Observation & {
  readonly currency: "usd";
  readonly priceUsd: number;
};

export type ObservationTable = readonly UsdObservation[];
