import type { ChartRenderer, RenderRequest } from "./types.js";

export interface QuickChartRendererInput {
  url: string;
  width: number;
  height: number;
  timeoutMs?: number;
  backgroundColor?: string;
  fetchImpl?: typeof fetch;
}

/** Renders Chart.js configs through a QuickChart endpoint (hosted or self-run). */
export class QuickChartRenderer implements ChartRenderer {
  readonly name = "quickchart";

  private readonly url: string;
  private readonly width: number;
  private readonly height: number;
  private readonly timeoutMs: number;
  private readonly backgroundColor: string;
  private readonly fetchImpl: typeof fetch;

  constructor(input: QuickChartRendererInput) {
    this.url = input.url;
    this.width = input.width;
    this.height = input.height;
    this.timeoutMs = input.timeoutMs ?? 30_000;
    this.backgroundColor = input.backgroundColor ?? "white";
    this.fetchImpl = input.fetchImpl ?? fetch;
  }

  async render(req: RenderRequest): Promise<Buffer> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          version: "4",
          width: this.width,
          height: this.height,
          format: req.format,
          backgroundColor: this.backgroundColor,
          chart: req.chart,
        }),
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text();
        throw new Error(`quickchart failed: ${res.status} ${body.slice(0, 200)}`);
      }
      return Buffer.from(await res.arrayBuffer());
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`quickchart timeout after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
