import { renderPriceChart, type RenderResult } from "./chart.js";
import { collect, type IterationReport, type Sleep } from "./collector.js";
import type { PipelineConfig } from "./config.js";
import { logger } from "./logger.js";
import { createPriceSource } from "./prices/index.js";
import { createChartRenderer } from "./renderers/index.js";
import type { ChartRenderer } from "./renderers/types.js";
import type { PriceSource } from "./types.js";

export type PipelineDeps = {
  source?: PriceSource;
  renderer?: ChartRenderer;
  sleep?: Sleep;
  now?: () => Date;
};

export type PipelineSummary = {
  records: number;
  iterations: IterationReport[];
  chart: RenderResult;
};

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps = {}): Promise<PipelineSummary> {
  const log = logger.child({ component: "pipeline" });
  log.info("starting cryptocurrency data pipeline");
  log.info(
    {
      coinIds: config.coinIds,
      vsCurrencies: config.vsCurrencies,
      iterations: config.iterations,
      delayMs: config.delayMs,
      outputPath: config.outputPath,
      priceSource: config.priceSource,
    },
    "configuration",
  );

  const source = deps.source ?? createPriceSource(config);
  const { table, iterations } = await collect(
    {
      iterations: config.iterations,
      delayMs: config.delayMs,
      coinIds: config.coinIds,
      vsCurrencies: config.vsCurrencies,
    },
    {
      source,
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
      ...(deps.now ? { now: deps.now } : {}),
    },
  );

  let chart: RenderResult = { status: "skipped" };
  if (table.length > 0) {
    chart = await renderPriceChart(table, config.outputPath, {
      renderer: deps.renderer ?? createChartRenderer(config),
    });
  } else {
    log.warn("visualization skipped: no data was collected");
  }

  log.info({ records: table.length, chart: chart.status }, "cryptocurrency data pipeline complete");
  return { records: table.length, iterations, chart };
}
