import fs from "node:fs";
import path from "node:path";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { ChartRenderer, ImageFormat } from "./renderers/types.js";
import type { ObservationTable, UsdObservation } from "./types.js";

export const CHART_TITLE = "Cryptocurrency Price Trend Over Time (USD)";

const palette = ["#2563eb", "#f59e0b", "#16a34a", "#ef4444", "#8b5cf6", "#06b6d4", "#f97316", "#64748b"];

export type ChartDataset = {
  label: string;
  data: Array<number | null>;
  borderColor: string;
  backgroundColor: string;
  borderWidth: number;
  pointRadius: number;
  pointStyle: "circle";
  fill: false;
  spanGaps: true;
  tension: number;
};

type TitleOption = { display: boolean; text: string };

export type ChartOptions = {
  plugins: {
    title: TitleOption & { font: { size: number }; padding: number };
    subtitle: TitleOption;
    legend: { display: boolean; position: "top" };
  };
  scales: {
    x: { title: TitleOption; grid: { display: boolean }; ticks: { minRotation: number; maxRotation: number } };
    y: { title: TitleOption; grid: { display: boolean }; beginAtZero: boolean };
  };
};

export type ChartConfig = {
  type: "line";
  data: { labels: string[]; datasets: ChartDataset[] };
  options: ChartOptions;
};

export type CoinSeries = {
  coin: string;
  label: string;
  points: UsdObservation[];
  first: number;
  last: number;
  /** null when the run started at a price of 0 */
  changePct: number | null;
};

export function capitalize(v: string) {
  return v ? v.charAt(0).toUpperCase() + v.slice(1).toLowerCase() : v;
}

export function timeLabel(d: Date) {
  return d.toISOString().slice(11, 19);
}

/** UTC `HH:MM:SS` labels, widened to milliseconds when two instants share a second. */
export function timeLabels(instants: readonly number[]): string[] {
  const seconds = new Set(instants.map((ms) => Math.floor(ms / 1000)));
  const precise = seconds.size < instants.length;
  return instants.map((ms) => (precise ? new Date(ms).toISOString().slice(11, 23) : timeLabel(new Date(ms))));
}

export function groupByCoin(table: ObservationTable): CoinSeries[] {
  const byCoin = new Map<string, UsdObservation[]>();
  for (const row of table) {
    const rows = byCoin.get(row.coin) ?? [];
    rows.push(row);
    byCoin.set(row.coin, rows);
  }

  const series: CoinSeries[] = [];
  for (const [coin, rows] of byCoin) {
    const points = [...rows].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    const first = points[0]?.priceUsd ?? 0;
    const last = points[points.length - 1]?.priceUsd ?? 0;
    const changePct = first === 0 ? null : ((last - first) / Math.abs(first)) * 100;
    series.push({ coin, label: capitalize(coin), points, first, last, changePct });
  }
  return series;
}

function formatChange(pct: number | null) {
  if (pct === null) return "n/a";
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(1)}%`;
}

function summaryLine(series: CoinSeries[]) {
  return series.map((s) => `${s.label} $${s.last.toFixed(2)} (${formatChange(s.changePct)})`).join(" • ");
}

export function buildPriceChart(table: ObservationTable): ChartConfig {
  const series = groupByCoin(table);

  const instants = [...new Set(table.map((r) => r.timestamp.getTime()))].sort((a, b) => a - b);
  const slot = new Map(instants.map((ms, i): [number, number] => [ms, i]));
  const labels = timeLabels(instants);

  const datasets = series.map((s, i): ChartDataset => {
    const data: Array<number | null> = labels.map(() => null);
    for (const p of s.points) {
      const at = slot.get(p.timestamp.getTime());
      if (at !== undefined) data[at] = p.priceUsd;
    }
    const color = palette[i % palette.length] ?? "#2563eb";
    return {
      label: s.label,
      data,
      borderColor: color,
      backgroundColor: color,
      borderWidth: 2,
      pointRadius: 4,
      pointStyle: "circle",
      fill: false,
      spanGaps: true,
      tension: 0,
    };
  });

  return {
    type: "line",
    data: { labels, datasets },
    options: {
      plugins: {
        title: { display: true, text: CHART_TITLE, font: { size: 16 }, padding: 12 },
        subtitle: { display: series.length > 0, text: summaryLine(series) },
        legend: { display: true, position: "top" },
      },
      scales: {
        x: {
          title: { display: true, text: "Time" },
          grid: { display: true },
          ticks: { minRotation: 45, maxRotation: 45 },
        },
        y: {
          title: { display: true, text: "Price (USD)" },
          grid: { display: true },
          beginAtZero: false,
        },
      },
    },
  };
}

const formats: Record<string, ImageFormat> = {
  ".png": "png",
  ".svg": "svg",
};

export function imageFormatFor(outFile: string): ImageFormat {
  return formats[path.extname(outFile).toLowerCase()] ?? "png";
}

export type RenderResult =
  | { status: "skipped" }
  | { status: "written"; outFile: string; series: string[]; points: number; bytes: number }
  | { status: "failed"; outFile: string; error: string };

export async function renderPriceChart(
  table: ObservationTable,
  outFile: string,
  deps: { renderer: ChartRenderer },
): Promise<RenderResult> {
  const log = logger.child({ component: "chart" });

  if (table.length === 0) {
    log.info("nothing to visualize");
    return { status: "skipped" };
  }

  const chart = buildPriceChart(table);
  const series = chart.data.datasets.map((d) => d.label);
  log.info({ outFile, series, renderer: deps.renderer.name }, "generating visualization");

  try {
    fs.mkdirSync(path.dirname(outFile), { recursive: true });
    const buf = await deps.renderer.render({ chart, format: imageFormatFor(outFile) });
    fs.writeFileSync(outFile, buf);
    log.info({ outFile, bytes: buf.length }, "plot saved");
    return { status: "written", outFile, series, points: chart.data.labels.length, bytes: buf.length };
  } catch (err) {
    const error = describeError(err);
    log.error({ outFile, err: error }, "error saving plot");
    return { status: "failed", outFile, error };
  }
}
