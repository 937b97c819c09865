import { beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../../config/config.js";
import type { LeverageService } from "../../leverage/index.js";
import { Workspace } from "../../leverage/workspace.js";
import { staticPriceMap } from "../../market/fallback-data.js";
import { PriceFeed } from "../../market/price-feed.js";
import { err, ok, type PriceSource } from "../../market/price-source.js";
import { setLogLevel } from "../../utils/logger.js";
import type { AnyAgentTool } from "./common.js";
import { createLeverageTools } from "./leverage-tools.js";

setLogLevel("silent");

const fakeSource: PriceSource = {
  name: "Fake",
  getCurrentPrices: async () => ok(staticPriceMap()),
  getTopCoins: async () =>
    ok({
      BTC: { coinId: "bitcoin", price: 67_000, rank: 1 },
      ETH: { coinId: "ethereum", price: 3_500, rank: 2 },
    }),
  getHistory: async () => err("HTTP 404"),
};

let service: LeverageService;
let tools: AnyAgentTool[];

beforeEach(() => {
  const config = loadConfig({ LEVERAGE_EXPORT_DIR: "/tmp/leverage-tools-test" });
  service = { workspace: new Workspace(new PriceFeed([fakeSource]), { settings: config.settings }), config };
  tools = createLeverageTools(async () => service);
});

async function run(name: string, args: unknown = {}) {
  const tool = tools.find((t) => t.name === name);
  if (!tool) {
    throw new Error(`no tool named ${name}`);
  }
  const result = await tool.execute("call-1", args);
  expect(result.content[0].text).toBe(JSON.stringify(result.details, null, 2));
  return result.details;
}

describe("leverage agent tools", () => {
  it("should expose the calculator tools", () => {
    expect(tools.map((t) => t.name)).toEqual([
      "leverage_evaluate",
      "leverage_add_position",
      "leverage_simulate",
      "leverage_history",
    ]);
  });

  it("should add a configured position", async () => {
    const details = await run("leverage_add_position", {
      coin: "eth",
      margin: 500,
      leverage: 4,
      stopLossPct: 5,
    });

    expect(details).toMatchObject({ success: true, message: "Updated ETH position." });
    expect(service.workspace.getPositions()).toMatchObject([
      { coin: "ETH", margin: 500, leverage: 4, stopLossPct: 5, takeProfitPct: 0 },
    ]);
  });

  it("should not keep a position whose values are rejected", async () => {
    const details = await run("leverage_add_position", { coin: "BTC", margin: 100, leverage: 2, stopLossPct: 150 });

    expect(details).toEqual({
      success: false,
      message: "Stop-loss must be a whole percentage between 0 and 100.",
    });
    expect(service.workspace.getPositions()).toEqual([]);
  });

  it("should require coin, margin and leverage", async () => {
    expect(await run("leverage_add_position", { coin: "BTC" })).toEqual({
      success: false,
      error: "Missing required parameters: coin, margin, leverage",
    });
  });

  it("should evaluate positions with a concentration line", async () => {
    await run("leverage_add_position", { coin: "BTC", margin: 1000, leverage: 5 });

    const details = await run("leverage_evaluate");

    expect(details).toMatchObject({
      summary: { totalMargin: 1000, totalExposure: 5000 },
      concentration: "BTC 100.0%",
      skippedCount: 0,
      priceSource: "Fake",
      advisories: [],
    });
  });

  it("should simulate a move and reset when no coin is given", async () => {
    await run("leverage_add_position", { coin: "BTC", margin: 1000, leverage: 5 });

    expect(await run("leverage_simulate", { coin: "BTC", movePct: -10 })).toEqual({
      moves: { BTC: -10 },
      results: [{ coin: "BTC", movePct: -10, pnl: -500 }],
      netPnl: -500,
    });
    expect(await run("leverage_simulate")).toEqual({
      moves: { BTC: 0 },
      results: [{ coin: "BTC", movePct: 0, pnl: 0 }],
      netPnl: 0,
    });
    expect(await run("leverage_simulate", { coin: "BTC" })).toEqual({
      success: false,
      error: "Missing required parameter: movePct",
    });
  });

  it("should fall back to sample history", async () => {
    const details = await run("leverage_history", { coin: "ETH" });

    expect(details).toMatchObject({
      coin: "ETH",
      coinId: "ethereum",
      source: "Sample",
      live: false,
      advisory: "Live history for ethereum unavailable; showing approximate values.",
    });
  });

  it("should ignore a rejected add when picking the default history coin", async () => {
    await run("leverage_add_position", { coin: "BTC", margin: 1000, leverage: 5 });
    await run("leverage_add_position", { coin: "ETH", margin: 100, leverage: 2, takeProfitPct: 500 });

    expect(await run("leverage_history")).toMatchObject({ coin: "BTC", coinId: "bitcoin" });
  });

  it("should report unknown coins", async () => {
    expect(await run("leverage_history", { coin: "doge" })).toEqual({
      success: false,
      error: "Unknown coin DOGE.",
    });
  });
});
