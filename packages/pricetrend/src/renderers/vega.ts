import resvg from "@resvg/resvg-js";
import { parse, View } from "vega";
import { compile, type TopLevelSpec } from "vega-lite";
import type { ChartConfig } from "../chart.js";
import type { ChartRenderer, RenderRequest } from "./types.js";

export interface VegaChartRendererInput {
  width: number;
  height: number;
  backgroundColor?: string;
}

type PricePoint = { time: string; coin: string; price: number };

// Room left around the plot for titles, axes and the legend.
const FRAME_X = 200;
const FRAME_Y = 180;

/** Translates the Chart.js line config into the equivalent Vega-Lite spec. */
export function toVegaLiteSpec(chart: ChartConfig, size: { width: number; height: number; background: string }): TopLevelSpec {
  const { labels, datasets } = chart.data;
  const { plugins, scales } = chart.options;

  const values: PricePoint[] = [];
  for (const ds of datasets) {
    ds.data.forEach((price, i) => {
      const time = labels[i];
      if (price !== null && time !== undefined) values.push({ time, coin: ds.label, price });
    });
  }

  return {
    $schema: "https://vega.github.io/schema/vega-lite/v5.json",
    width: Math.max(100, size.width - FRAME_X),
    height: Math.max(100, size.height - FRAME_Y),
    background: size.background,
    padding: 12,
    title: {
      text: plugins.title.text,
      fontSize: plugins.title.font.size,
      ...(plugins.subtitle.display ? { subtitle: plugins.subtitle.text } : {}),
    },
    data: { values },
    mark: { type: "line", point: true, strokeWidth: 2 },
    encoding: {
      x: {
        field: "time",
        type: "ordinal",
        sort: labels,
        title: scales.x.title.text,
        axis: { labelAngle: -scales.x.ticks.maxRotation, grid: scales.x.grid.display },
      },
      y: {
        field: "price",
        type: "quantitative",
        title: scales.y.title.text,
        scale: { zero: scales.y.beginAtZero },
        axis: { grid: scales.y.grid.display },
      },
      color: {
        field: "coin",
        type: "nominal",
        title: null,
        scale: { domain: datasets.map((d) => d.label), range: datasets.map((d) => d.borderColor) },
        legend: plugins.legend.display ? { orient: plugins.legend.position } : null,
      },
    },
  };
}

/** Renders charts in process: Vega draws the SVG, resvg rasterises it for PNG output. */
export class VegaChartRenderer implements ChartRenderer {
  readonly name = "vega";

  private readonly width: number;
  private readonly height: number;
  private readonly backgroundColor: string;

  constructor(input: VegaChartRendererInput) {
    this.width = input.width;
    this.height = input.height;
    this.backgroundColor = input.backgroundColor ?? "white";
  }

  async render(req: RenderRequest): Promise<Buffer> {
    const spec = toVegaLiteSpec(req.chart, { width: this.width, height: this.height, background: this.backgroundColor });
    const view = new View(parse(compile(spec).spec), { renderer: "none" });

    try {
      const svg = await view.toSVG();
      if (req.format === "svg") return Buffer.from(svg, "utf8");
      return new resvg.Resvg(svg, {
        background: this.backgroundColor,
        fitTo: { mode: "width", value: this.width },
      })
        .render()
        .asPng();
    } finally {
      view.finalize();
    }
  }
}
