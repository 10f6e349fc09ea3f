import { describe, expect, it, vi } from "vitest";
import { buildPriceChart } from "../src/chart.js";
import { QuickChartRenderer } from "../src/renderers/quickchart.js";

const chart = buildPriceChart([
  { timestamp: new Date("2026-01-01T10:00:00Z"), coin: "bitcoin", currency: "usd", price: 30000, priceUsd: 30000 },
]);

function renderer(fetchImpl: typeof fetch, timeoutMs = 1_000) {
  return new QuickChartRenderer({ url: "https://charts.example.test/chart", width: 800, height: 400, timeoutMs, fetchImpl });
}

describe("QuickChartRenderer", () => {
  it("posts the chart config and returns the image bytes", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(new Uint8Array([137, 80, 78, 71]), { status: 200 }));

    const buf = await renderer(fetchImpl).render({ chart, format: "png" });

    expect([...buf]).toEqual([137, 80, 78, 71]);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const call = fetchImpl.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://charts.example.test/chart");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      version: "4",
      width: 800,
      height: 400,
      format: "png",
      backgroundColor: "white",
      chart: JSON.parse(JSON.stringify(chart)),
    });
  });

  it("fails with the status and the start of the body", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response("bad chart", { status: 400 }));

    await expect(renderer(fetchImpl).render({ chart, format: "png" })).rejects.toThrow("quickchart failed: 400 bad chart");
  });

  it("aborts a render that outlives its deadline", async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );

    await expect(renderer(fetchImpl, 5).render({ chart, format: "svg" })).rejects.toThrow("quickchart timeout after 5ms");
  });
});
