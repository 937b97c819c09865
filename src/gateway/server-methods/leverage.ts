import type { CalculatorSettings } from "../../config/config.js";
import type { PositionPatch } from "../../leverage/position.js";
import type { GatewayRequestHandlers } from "./types.js";
import { getLeverageService, type LeverageService } from "../../leverage/index.js";
import { errorMessage } from "../../utils/errors.js";
import {
  asParams,
  readBooleanParam,
  readNumberParam,
  readStringParam,
} from "../../utils/params.js";

export type ServiceGetter = () => Promise<LeverageService>;

function internalError(err: unknown) {
  return { code: "INTERNAL_ERROR" as const, message: errorMessage(err) };
}

function invalidParams(message: string) {
  return { code: "INVALID_PARAMS" as const, message };
}

export function createLeverageHandlers(getService: ServiceGetter): GatewayRequestHandlers {
  return {
    "leverage.get": async ({ params, respond }) => {
      try {
        const refresh = readBooleanParam(asParams(params), "refresh");
        const { workspace } = await getService();
        if (refresh) {
          workspace.refreshPrices();
        }
        respond(true, await workspace.evaluate());
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.add": async ({ params, respond, context }) => {
      try {
        const coin = readStringParam(asParams(params), "coin");
        const { workspace } = await getService();
        const result = workspace.addPosition(coin);
        if (result.success && result.position) {
          context.broadcast("leverage.updated", {
            action: "add",
            id: result.position.id,
            coin: result.position.coin,
          });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.update": async ({ params, respond, context }) => {
      const p = asParams(params);
      const id = readStringParam(p, "id");
      if (!id) {
        respond(false, undefined, invalidParams("Missing required field: id"));
        return;
      }

      const patch: PositionPatch = {};
      const coin = readStringParam(p, "coin");
      const margin = readNumberParam(p, "margin");
      const leverage = readNumberParam(p, "leverage");
      const stopLossPct = readNumberParam(p, "stopLossPct");
      const takeProfitPct = readNumberParam(p, "takeProfitPct");
      if (coin !== undefined) patch.coin = coin;
      if (margin !== undefined) patch.margin = margin;
      if (leverage !== undefined) patch.leverage = leverage;
      if (stopLossPct !== undefined) patch.stopLossPct = stopLossPct;
      if (takeProfitPct !== undefined) patch.takeProfitPct = takeProfitPct;

      try {
        const { workspace } = await getService();
        const result = workspace.updatePosition(id, patch);
        if (result.success) {
          context.broadcast("leverage.updated", { action: "update", id });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.remove": async ({ params, respond, context }) => {
      const id = readStringParam(asParams(params), "id");
      if (!id) {
        respond(false, undefined, invalidParams("Missing required field: id"));
        return;
      }

      try {
        const { workspace } = await getService();
        const removed = workspace.removePosition(id);
        if (removed) {
          context.broadcast("leverage.updated", { action: "remove", id });
        }
        respond(true, { success: removed, id });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.clear": async ({ respond, context }) => {
      try {
        const { workspace } = await getService();
        const removed = workspace.clearPositions();
        context.broadcast("leverage.updated", { action: "clear", removed });
        respond(true, { success: true, removed });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.import": async ({ params, respond, context }) => {
      const content = asParams(params).content;
      if (typeof content !== "string" || content.trim() === "") {
        respond(false, undefined, invalidParams("Missing required field: content"));
        return;
      }

      try {
        const { workspace } = await getService();
        const result = workspace.importJson(content);
        if (result.success) {
          context.broadcast("leverage.updated", { action: "import", count: result.count });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.export": async ({ params, respond }) => {
      const p = asParams(params);
      const format = readStringParam(p, "format") ?? "json";
      if (format !== "json" && format !== "csv") {
        respond(false, undefined, invalidParams(`Invalid format: ${format}. Must be "json" or "csv".`));
        return;
      }

      try {
        const { workspace, config } = await getService();
        if (readBooleanParam(p, "writeToDisk")) {
          const path = await workspace.writeExport(config.exportDir, format);
          respond(true, { success: true, format, path });
          return;
        }
        const content = format === "json" ? workspace.exportJson() : await workspace.exportCsv();
        respond(true, { success: true, format, content });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.scenario.set": async ({ params, respond }) => {
      const p = asParams(params);
      const coin = readStringParam(p, "coin");
      const movePct = readNumberParam(p, "movePct");
      if (!coin || movePct === undefined) {
        respond(false, undefined, invalidParams("Missing required fields: coin, movePct"));
        return;
      }

      try {
        const { workspace } = await getService();
        const applied = workspace.setScenarioMove(coin, movePct);
        const snapshot = await workspace.evaluate();
        respond(true, { coin: coin.toUpperCase(), movePct: applied, scenario: snapshot.scenario });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.scenario.reset": async ({ respond }) => {
      try {
        const { workspace } = await getService();
        const moves = workspace.resetScenario();
        const snapshot = await workspace.evaluate();
        respond(true, { moves, scenario: snapshot.scenario });
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.settings": async ({ params, respond, context }) => {
      const p = asParams(params);
      const patch: Partial<CalculatorSettings> = {};
      const maintenanceMarginPct = readNumberParam(p, "maintenanceMarginPct");
      const fundingRate = readNumberParam(p, "fundingRate");
      const useLivePrices = readBooleanParam(p, "useLivePrices");
      if (maintenanceMarginPct !== undefined) patch.maintenanceMarginPct = maintenanceMarginPct;
      if (fundingRate !== undefined) patch.fundingRate = fundingRate;
      if (useLivePrices !== undefined) patch.useLivePrices = useLivePrices;

      try {
        const { workspace } = await getService();
        if (Object.keys(patch).length === 0) {
          respond(true, { success: true, message: "Current settings.", settings: workspace.getSettings() });
          return;
        }
        const result = workspace.updateSettings(patch);
        if (result.success) {
          context.broadcast("leverage.updated", { action: "settings", settings: result.settings });
        }
        respond(true, result);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },

    "leverage.history": async ({ params, respond }) => {
      try {
        const coin = readStringParam(asParams(params), "coin");
        const { workspace } = await getService();
        const result = await workspace.getHistory(coin);
        if (!result.success) {
          respond(false, undefined, { code: "NOT_FOUND", message: result.message });
          return;
        }
        respond(true, result.history);
      } catch (err) {
        respond(false, undefined, internalError(err));
      }
    },
  };
}

export const leverageHandlers: GatewayRequestHandlers = createLeverageHandlers(getLeverageService);
