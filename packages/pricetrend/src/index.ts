export { collect, sleep } from "./collector.js";
export type { CollectDeps, CollectOptions, CollectResult, IterationReport, Normalize, Sleep } from "./collector.js";
export { buildPriceChart, renderPriceChart, imageFormatFor } from "./chart.js";
export type { ChartConfig, ChartOptions, RenderResult } from "./chart.js";
export { readPipelineConfig } from "./config.js";
export type { PipelineConfig } from "./config.js";
export { PriceSourceError, describeError } from "./errors.js";
export { derivePriceRows, normalize, USD_PER_INR } from "./normalize.js";
export { main } from "./main.js";
export { runPipeline } from "./pipeline.js";
export type { PipelineDeps, PipelineSummary } from "./pipeline.js";
export { createPriceSource, FallbackPriceSource, LivePriceSource, SyntheticPriceSource } from "./prices/index.js";
export { createChartRenderer, FallbackChartRenderer, QuickChartRenderer, VegaChartRenderer } from "./renderers/index.js";
export type { ChartRenderer } from "./renderers/index.js";
export type { Observation, ObservationTable, PriceSource, RawPriceMap, UsdObservation } from "./types.js";
