import "dotenv/config";
import os from "node:os";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "../utils/errors.js";

export const CalculatorSettingsSchema = Type.Object({
  /** Percent of notional required to keep a position open. */
  maintenanceMarginPct: Type.Number({ minimum: 0.1, maximum: 5 }),
  useLivePrices: Type.Boolean(),
  /** Funding rate per 8h period. */
  fundingRate: Type.Number({ minimum: 0, maximum: 0.01 }),
});

export type CalculatorSettings = Static<typeof CalculatorSettingsSchema>;

export const DEFAULT_SETTINGS: CalculatorSettings = {
  maintenanceMarginPct: 0.5,
  useLivePrices: true,
  fundingRate: 0.0002,
};

export const AppConfigSchema = Type.Object({
  settings: CalculatorSettingsSchema,
  fetchTimeoutMs: Type.Integer({ minimum: 100, maximum: 60_000 }),
  topCoinsLimit: Type.Integer({ minimum: 1, maximum: 250 }),
  historyDays: Type.Integer({ minimum: 1, maximum: 365 }),
  exportDir: Type.String({ minLength: 1 }),
});

export type AppConfig = Static<typeof AppConfigSchema>;

const ENV_KEYS: Record<string, string> = {
  "/settings/maintenanceMarginPct": "LEVERAGE_MAINTENANCE_MARGIN_PCT",
  "/settings/useLivePrices": "LEVERAGE_USE_LIVE_PRICES",
  "/settings/fundingRate": "LEVERAGE_FUNDING_RATE",
  "/fetchTimeoutMs": "LEVERAGE_FETCH_TIMEOUT_MS",
  "/topCoinsLimit": "LEVERAGE_TOP_COINS_LIMIT",
  "/historyDays": "LEVERAGE_HISTORY_DAYS",
  "/exportDir": "LEVERAGE_EXPORT_DIR",
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigError(name, `"${raw}" is not a number`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(name, `"${raw}" is not a boolean`);
}

/**
 * Build the application config from environment variables (a `.env` file in
 * the working directory is loaded on import). Throws ConfigError naming the
 * first variable that is malformed or out of range.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config: AppConfig = {
    settings: {
      maintenanceMarginPct: readNumber(
        env,
        "LEVERAGE_MAINTENANCE_MARGIN_PCT",
        DEFAULT_SETTINGS.maintenanceMarginPct,
      ),
      useLivePrices: readBoolean(env, "LEVERAGE_USE_LIVE_PRICES", DEFAULT_SETTINGS.useLivePrices),
      fundingRate: readNumber(env, "LEVERAGE_FUNDING_RATE", DEFAULT_SETTINGS.fundingRate),
    },
    fetchTimeoutMs: readNumber(env, "LEVERAGE_FETCH_TIMEOUT_MS", 5_000),
    topCoinsLimit: readNumber(env, "LEVERAGE_TOP_COINS_LIMIT", 50),
    historyDays: readNumber(env, "LEVERAGE_HISTORY_DAYS", 7),
    exportDir: env.LEVERAGE_EXPORT_DIR?.trim() || path.join(os.homedir(), ".leverage-desk"),
  };

  const first = Value.Errors(AppConfigSchema, config).First();
  if (first) {
    throw new ConfigError(ENV_KEYS[first.path] ?? first.path, first.message);
  }
  return config;
}

/**
 * Apply a partial settings update. Returns the merged settings, or an error
 * message when the result falls outside the accepted ranges.
 */
export function mergeSettings(
  current: CalculatorSettings,
  patch: Partial<CalculatorSettings>,
): { ok: true; settings: CalculatorSettings } | { ok: false; message: string } {
  const merged: CalculatorSettings = {
    maintenanceMarginPct: patch.maintenanceMarginPct ?? current.maintenanceMarginPct,
    useLivePrices: patch.useLivePrices ?? current.useLivePrices,
    fundingRate: patch.fundingRate ?? current.fundingRate,
  };
  const first = Value.Errors(CalculatorSettingsSchema, merged).First();
  if (first) {
    return { ok: false, message: `${first.path.slice(1)} ${first.message}` };
  }
  return { ok: true, settings: merged };
}
