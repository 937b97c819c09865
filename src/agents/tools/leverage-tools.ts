import { Type } from "@sinclair/typebox";
import type { PositionPatch } from "../../leverage/position.js";
import { getLeverageService, type LeverageService } from "../../leverage/index.js";
import { formatConcentration } from "../../leverage/portfolio-aggregator.js";
import { errorMessage } from "../../utils/errors.js";
import { asParams } from "../../utils/params.js";
import { jsonResult, type AnyAgentTool, readStringParam, readNumberParam } from "./common.js";

export function createLeverageTools(
  getService: () => Promise<LeverageService> = getLeverageService,
): AnyAgentTool[] {
  return [
    {
      label: "Leverage Evaluate",
      name: "leverage_evaluate",
      description:
        "Value every position in the leverage calculator at current prices: position size, tokens, liquidation price, stop-loss/take-profit P/L, portfolio totals, exposure by coin and a Low/Medium/High risk level.",
      parameters: Type.Object({}),
      execute: async () => {
        try {
          const { workspace } = await getService();
          const snapshot = await workspace.evaluate();
          return jsonResult({
            valuations: snapshot.valuations,
            summary: snapshot.summary,
            concentration: formatConcentration(snapshot.summary.concentration),
            skippedCount: snapshot.skippedCount,
            priceSource: snapshot.priceSource,
            advisories: snapshot.advisories,
          });
        } catch (err) {
          return jsonResult({ success: false, error: `Leverage error: ${errorMessage(err)}` });
        }
      },
    },
    {
      label: "Leverage Add Position",
      name: "leverage_add_position",
      description:
        "Add a leveraged long position to the calculator. Margin is in USD; stop-loss and take-profit are whole percentages (0 = not set).",
      parameters: Type.Object({
        coin: Type.String({ description: "Coin ticker symbol (e.g., BTC, ETH, SOL)" }),
        margin: Type.Number({ description: "Margin committed in USD" }),
        leverage: Type.Number({ description: "Leverage multiplier (e.g., 5 for 5x)" }),
        stopLossPct: Type.Optional(Type.Integer({ description: "Stop-loss percent 0-100" })),
        takeProfitPct: Type.Optional(Type.Integer({ description: "Take-profit percent 0-100" })),
      }),
      execute: async (_toolCallId, args) => {
        const params = asParams(args);
        const coin = readStringParam(params, "coin");
        const margin = readNumberParam(params, "margin");
        const leverage = readNumberParam(params, "leverage");

        if (!coin || margin === undefined || leverage === undefined) {
          return jsonResult({
            success: false,
            error: "Missing required parameters: coin, margin, leverage",
          });
        }

        const patch: PositionPatch = { margin, leverage };
        const stopLossPct = readNumberParam(params, "stopLossPct");
        const takeProfitPct = readNumberParam(params, "takeProfitPct");
        if (stopLossPct !== undefined) patch.stopLossPct = stopLossPct;
        if (takeProfitPct !== undefined) patch.takeProfitPct = takeProfitPct;

        try {
          const { workspace } = await getService();
          const added = workspace.addPosition(coin);
          if (!added.position) {
            return jsonResult(added);
          }
          const updated = workspace.updatePosition(added.position.id, patch);
          if (!updated.success) {
            workspace.removePosition(added.position.id);
          }
          return jsonResult(updated);
        } catch (err) {
          return jsonResult({ success: false, error: `Leverage error: ${errorMessage(err)}` });
        }
      },
    },
    {
      label: "Leverage Simulate",
      name: "leverage_simulate",
      description:
        "Project P/L if a coin's price moved by a percentage (-50 to 50). Positions are not changed. Omit coin to reset every move to 0.",
      parameters: Type.Object({
        coin: Type.Optional(Type.String({ description: "Coin ticker symbol (e.g., BTC)" })),
        movePct: Type.Optional(Type.Number({ description: "Price move in percent, -50 to 50" })),
      }),
      execute: async (_toolCallId, args) => {
        const params = asParams(args);
        const coin = readStringParam(params, "coin");
        const movePct = readNumberParam(params, "movePct");

        if (coin && movePct === undefined) {
          return jsonResult({ success: false, error: "Missing required parameter: movePct" });
        }

        try {
          const { workspace } = await getService();
          if (coin && movePct !== undefined) {
            workspace.setScenarioMove(coin, movePct);
          } else {
            workspace.resetScenario();
          }
          const snapshot = await workspace.evaluate();
          return jsonResult({ moves: snapshot.scenarioMoves, ...snapshot.scenario });
        } catch (err) {
          return jsonResult({ success: false, error: `Leverage error: ${errorMessage(err)}` });
        }
      },
    },
    {
      label: "Leverage Price History",
      name: "leverage_history",
      description:
        "Get the recent daily price history for a coin. Falls back to a sample series (live=false) when prices are unavailable.",
      parameters: Type.Object({
        coin: Type.Optional(
          Type.String({ description: "Coin ticker symbol. Defaults to the last added coin." }),
        ),
      }),
      execute: async (_toolCallId, args) => {
        const coin = readStringParam(asParams(args), "coin");
        try {
          const { workspace } = await getService();
          const result = await workspace.getHistory(coin);
          return jsonResult(result.success ? result.history : { success: false, error: result.message });
        } catch (err) {
          return jsonResult({ success: false, error: `Leverage error: ${errorMessage(err)}` });
        }
      },
    },
  ];
}
