import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import type { Sleep } from "../src/collector.js";
import type { PipelineConfig } from "../src/config.js";
import { runPipeline, SyntheticPriceSource } from "../src/index.js";
import type { ChartRenderer, RenderRequest } from "../src/renderers/types.js";
import type { PriceFetchResult, PriceSource } from "../src/types.js";

const PNG_SIGNATURE = [137, 80, 78, 71, 13, 10, 26, 10];

function mkTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "pricetrend-pipeline-test-"));
}

function config(outputPath: string): PipelineConfig {
  return {
    coinIds: ["bitcoin", "ethereum"],
    vsCurrencies: ["usd", "inr"],
    iterations: 2,
    delayMs: 1000,
    outputPath,
    priceSource: "synthetic",
    priceApiUrl: "https://prices.example.test/api/v3",
    priceApiTimeoutMs: 1000,
    chartRenderer: "vega",
    chartRenderUrl: "https://charts.example.test/chart",
    chartWidth: 800,
    chartHeight: 400,
  };
}

function fakeRenderer() {
  const render = vi.fn<(req: RenderRequest) => Promise<Buffer>>(async () => Buffer.from("IMG"));
  const renderer: ChartRenderer = { name: "fake", render };
  return { renderer, render };
}

describe("runPipeline", () => {
  it("collects usd samples for every coin and writes the chart", async () => {
    const outFile = path.join(mkTempDir(), "output", "crypto_price_trend.png");
    const { renderer, render } = fakeRenderer();
    const waits: number[] = [];
    const sleep: Sleep = async (ms) => {
      waits.push(ms);
    };

    let t = Date.parse("2026-01-01T10:00:00Z");
    const now = () => new Date((t += 5000));

    const summary = await runPipeline(config(outFile), {
      source: new SyntheticPriceSource(() => 0.5),
      renderer,
      sleep,
      now,
    });

    expect(summary.records).toBe(4);
    expect(summary.iterations.map((r) => r.rows)).toEqual([2, 2]);
    expect(summary.chart).toEqual({ status: "written", outFile, series: ["Bitcoin", "Ethereum"], points: 2, bytes: 3 });
    expect(waits).toEqual([1000]);
    expect(fs.readFileSync(outFile, "utf8")).toBe("IMG");
    expect(render).toHaveBeenCalledTimes(1);
  });

  it("builds its own source from the config when none is given", async () => {
    const outFile = path.join(mkTempDir(), "chart.png");
    const { renderer } = fakeRenderer();

    const summary = await runPipeline(config(outFile), { renderer, sleep: async () => {} });

    expect(summary.records).toBe(4);
    expect(summary.iterations.every((r) => r.source === "synthetic")).toBe(true);
  });

  it("renders a real image in process when no renderer is given", async () => {
    const outFile = path.join(mkTempDir(), "output", "crypto_price_trend.png");
    let t = Date.parse("2026-01-01T10:00:00Z");
    const now = () => new Date((t += 5000));

    const summary = await runPipeline(config(outFile), {
      source: new SyntheticPriceSource(() => 0.5),
      sleep: async () => {},
      now,
    });

    expect(summary.chart).toMatchObject({ status: "written", outFile, series: ["Bitcoin", "Ethereum"], points: 2 });
    expect([...fs.readFileSync(outFile).subarray(0, 8)]).toEqual(PNG_SIGNATURE);
  });

  it("skips the chart when nothing was collected", async () => {
    const outFile = path.join(mkTempDir(), "output", "chart.png");
    const { renderer, render } = fakeRenderer();
    const failing: PriceSource = {
      kind: "live",
      fetchPrices: async (): Promise<PriceFetchResult> => {
        throw new Error("offline");
      },
    };

    const summary = await runPipeline(config(outFile), { source: failing, renderer, sleep: async () => {} });

    expect(summary.records).toBe(0);
    expect(summary.chart).toEqual({ status: "skipped" });
    expect(render).not.toHaveBeenCalled();
    expect(fs.existsSync(path.dirname(outFile))).toBe(false);
  });
});
