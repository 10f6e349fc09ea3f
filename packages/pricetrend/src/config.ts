import dotenv from "dotenv";
import { z } from "zod";
import { splitList } from "./ids.js";

dotenv.config({ quiet: true });

const idList = z
  .string()
  .transform(splitList)
  .refine((ids) => ids.length > 0, { message: "must name at least one identifier" });

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info");

const envSchema = z.object({
  COIN_IDS: idList.default("bitcoin,ethereum"),
  VS_CURRENCIES: idList.default("usd,inr"),
  ITERATIONS: z.coerce.number().int().positive().default(3),
  DELAY_SEC: z.coerce.number().nonnegative().default(5),
  OUTPUT_PATH: z.string().min(1).default("output/crypto_price_trend.png"),
  PRICE_SOURCE: z.enum(["live", "synthetic"]).default("live"),
  PRICE_API_URL: z.string().url().default("https://api.coingecko.com/api/v3"),
  PRICE_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CHART_RENDERER: z.enum(["vega", "quickchart"]).default("vega"),
  CHART_RENDER_URL: z.string().url().default("https://quickchart.io/chart"),
  CHART_WIDTH: z.coerce.number().int().positive().default(1200),
  CHART_HEIGHT: z.coerce.number().int().positive().default(600),
  LOG_LEVEL: logLevelSchema,
});

export type Env = z.infer<typeof envSchema>;

export type PipelineConfig = {
  coinIds: string[];
  vsCurrencies: string[];
  iterations: number;
  delayMs: number;
  outputPath: string;
  priceSource: Env["PRICE_SOURCE"];
  priceApiUrl: string;
  priceApiTimeoutMs: number;
  chartRenderer: Env["CHART_RENDERER"];
  chartRenderUrl: string;
  chartWidth: number;
  chartHeight: number;
};

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export function readPipelineConfig(source: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = parseEnv(source);
  return {
    coinIds: parsed.COIN_IDS,
    vsCurrencies: parsed.VS_CURRENCIES,
    iterations: parsed.ITERATIONS,
    delayMs: Math.round(parsed.DELAY_SEC * 1000),
    outputPath: parsed.OUTPUT_PATH,
    priceSource: parsed.PRICE_SOURCE,
    priceApiUrl: parsed.PRICE_API_URL,
    priceApiTimeoutMs: parsed.PRICE_API_TIMEOUT_MS,
    chartRenderer: parsed.CHART_RENDERER,
    chartRenderUrl: parsed.CHART_RENDER_URL,
    chartWidth: parsed.CHART_WIDTH,
    chartHeight: parsed.CHART_HEIGHT,
  };
}
