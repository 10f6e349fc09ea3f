import { describeError } from "./errors.js";
import { uniqueIds } from "./ids.js";
import { logger } from "./logger.js";
import { normalize } from "./normalize.js";
import type { ObservationTable, PriceSource, PriceSourceKind, UsdObservation } from "./types.js";

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface CollectOptions {
  iterations: number;
  delayMs: number;
  coinIds: readonly string[];
  vsCurrencies: readonly string[];
}

export type Normalize = typeof normalize;

export interface CollectDeps {
  source: PriceSource;
  normalize?: Normalize;
  sleep?: Sleep;
  now?: () => Date;
}

export type IterationReport = {
  index: number;
  rows: number;
  source?: PriceSourceKind;
  error?: string;
};

export type CollectResult = {
  table: ObservationTable;
  iterations: IterationReport[];
};

function validateOptions(opts: CollectOptions) {
  if (!Number.isInteger(opts.iterations) || opts.iterations < 1) {
    throw new RangeError(`iterations must be a positive integer, got ${opts.iterations}`);
  }
  if (!Number.isFinite(opts.delayMs) || opts.delayMs < 0) {
    throw new RangeError(`delayMs must be a non-negative number, got ${opts.delayMs}`);
  }
}

/**
 * Runs fetch + normalize `iterations` times, waiting `delayMs` between cycles.
 * A failing cycle contributes no rows; the loop always runs to completion.
 */
export async function collect(opts: CollectOptions, deps: CollectDeps): Promise<CollectResult> {
  validateOptions(opts);

  const wait = deps.sleep ?? sleep;
  const toRows = deps.normalize ?? normalize;
  const now = deps.now ?? (() => new Date());
  const coinIds = uniqueIds(opts.coinIds);
  const vsCurrencies = uniqueIds(opts.vsCurrencies);
  const log = logger.child({ component: "collector" });

  const table: UsdObservation[] = [];
  const reports: IterationReport[] = [];

  log.info({ iterations: opts.iterations, coinIds, vsCurrencies }, "data collection loop started");

  for (let index = 1; index <= opts.iterations; index++) {
    log.info({ iteration: index, of: opts.iterations }, "collecting");
    const report: IterationReport = { index, rows: 0 };

    try {
      const fetched = await deps.source.fetchPrices(coinIds, vsCurrencies);
      report.source = fetched.source;

      if (Object.keys(fetched.prices).length === 0) {
        log.warn({ iteration: index }, "no raw data ingested");
      } else {
        const rows = toRows(fetched.prices, now);
        if (rows && rows.length > 0) {
          table.push(...rows);
          report.rows = rows.length;
          log.info(
            {
              iteration: index,
              source: fetched.source,
              at: rows[0]?.timestamp.toISOString(),
              coins: rows.map((r) => r.coin),
              pricesUsd: rows.map((r) => r.priceUsd),
            },
            "data point collected",
          );
        } else {
          log.warn({ iteration: index }, "no valid data processed");
        }
      }
    } catch (err) {
      report.error = describeError(err);
      log.error({ iteration: index, err: report.error }, "data collection failed");
    }

    reports.push(report);

    if (index < opts.iterations) {
      log.info({ delayMs: opts.delayMs }, "waiting before next collection");
      await wait(opts.delayMs);
    }
  }

  log.info({ records: table.length }, "data aggregation complete");
  return { table, iterations: reports };
}
