import { describeError } from "../errors.js";
import { logger } from "../logger.js";
import type { ChartRenderer, RenderRequest } from "./types.js";

export class FallbackChartRenderer implements ChartRenderer {
  private readonly log = logger.child({ component: "fallback-chart-renderer" });

  constructor(
    private readonly primary: ChartRenderer,
    private readonly fallback: ChartRenderer,
  ) {}

  get name() {
    return this.primary.name;
  }

  async render(req: RenderRequest): Promise<Buffer> {
    try {
      return await this.primary.render(req);
    } catch (error) {
      this.log.warn(
        { primary: this.primary.name, fallback: this.fallback.name, err: describeError(error) },
        "primary chart renderer failed, rendering locally",
      );
    }
    return this.fallback.render(req);
  }
}
