import type { PipelineConfig } from "../config.js";
import { FallbackChartRenderer } from "./fallback.js";
import { QuickChartRenderer } from "./quickchart.js";
import type { ChartRenderer } from "./types.js";
import { VegaChartRenderer } from "./vega.js";

export { FallbackChartRenderer } from "./fallback.js";
export { QuickChartRenderer } from "./quickchart.js";
export { VegaChartRenderer, toVegaLiteSpec } from "./vega.js";
export type { ChartRenderer, ImageFormat, RenderRequest } from "./types.js";

/** `vega` renders in process; `quickchart` posts to the endpoint and falls back to vega. */
export function createChartRenderer(
  config: Pick<PipelineConfig, "chartRenderer" | "chartRenderUrl" | "chartWidth" | "chartHeight">,
): ChartRenderer {
  const local = new VegaChartRenderer({ width: config.chartWidth, height: config.chartHeight });
  if (config.chartRenderer === "vega") return local;

  const remote = new QuickChartRenderer({
    url: config.chartRenderUrl,
    width: config.chartWidth,
    height: config.chartHeight,
  });
  return new FallbackChartRenderer(remote, local);
}
