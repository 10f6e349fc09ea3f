import type { ChartConfig } from "../chart.js";

export type ImageFormat = "png" | "svg";

export type RenderRequest = {
  chart: ChartConfig;
  format: ImageFormat;
};

export interface ChartRenderer {
  readonly name: string;
  render(req: RenderRequest): Promise<Buffer>;
}
