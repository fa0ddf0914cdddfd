import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { MARKET_TIME_ZONE } from "../lib/date";
import { ConfigError } from "./errors";
import type { IndexInstrument, PriceAdjustment } from "./types";
import { PRICE_ADJUSTMENTS } from "./types";

export const SERIES_PROVIDERS = ["eastmoney", "yahoo"] as const;

export type SeriesProviderName = (typeof SERIES_PROVIDERS)[number];

export type MarketConfig = {
  universe: {
    size: number;
  };
  window: {
    lookbackDays: number;
    timeZone: string;
  };
  fetch: {
    seriesProvider: SeriesProviderName;
    adjust: PriceAdjustment;
    concurrency: number;
    requestTimeoutMs: number;
    pacing: {
      indexMs: number;
      equityMs: number;
    };
  };
  output: {
    dir: string;
  };
};

export const DEFAULT_MARKET_CONFIG: MarketConfig = {
  universe: { size: 100 },
  window: { lookbackDays: 365, timeZone: MARKET_TIME_ZONE },
  fetch: {
    seriesProvider: "eastmoney",
    adjust: "qfq",
    concurrency: 1,
    requestTimeoutMs: 15000,
    pacing: { indexMs: 500, equityMs: 300 }
  },
  output: { dir: "output" }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
  return value;
}

function assertNumber(value: unknown, name: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a finite number`);
  }
  return value;
}

function assertPositiveInteger(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${n}`);
  }
  return n;
}

function assertNonNegativeInteger(value: unknown, name: string): number {
  const n = assertNumber(value, name);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got ${n}`);
  }
  return n;
}

function assertOneOf<T extends string>(value: unknown, allowed: readonly T[], name: string): T {
  const s = assertString(value, name);
  const match = allowed.find((a) => a === s);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of ${allowed.join(", ")}, got ${s}`);
  }
  return match;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`);
  }
  return value;
}

function assertTimeZone(value: string): string {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: value });
  } catch (error) {
    throw new ConfigError(`window.timeZone is not a known IANA zone: ${value}`, { cause: error });
  }
  return value;
}

/**
* Validates a parsed `market.yml` document. Missing keys fall back to
* `DEFAULT_MARKET_CONFIG`; present keys must be well-formed.
*/
export function parseMarketConfig(raw: unknown, rootDir = process.cwd()): MarketConfig {
  if (raw === null || raw === undefined) {
    raw = {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError("market.yml must be a mapping");
  }

  const d = DEFAULT_MARKET_CONFIG;
  const universe = section(raw, "universe");
  const window = section(raw, "window");
  const fetchCfg = section(raw, "fetch");
  const pacing = section(fetchCfg, "pacing");
  const output = section(raw, "output");

  const outputDir = assertString(output.dir ?? d.output.dir, "output.dir");

  return {
    universe: {
      size: assertNonNegativeInteger(universe.size ?? d.universe.size, "universe.size")
    },
    window: {
      lookbackDays: assertPositiveInteger(window.lookbackDays ?? d.window.lookbackDays, "window.lookbackDays"),
      timeZone: assertTimeZone(assertString(window.timeZone ?? d.window.timeZone, "window.timeZone"))
    },
    fetch: {
      seriesProvider: assertOneOf(
        fetchCfg.seriesProvider ?? d.fetch.seriesProvider,
        SERIES_PROVIDERS,
        "fetch.seriesProvider"
      ),
      adjust: assertOneOf(fetchCfg.adjust ?? d.fetch.adjust, PRICE_ADJUSTMENTS, "fetch.adjust"),
      concurrency: assertPositiveInteger(fetchCfg.concurrency ?? d.fetch.concurrency, "fetch.concurrency"),
      requestTimeoutMs: assertPositiveInteger(
        fetchCfg.requestTimeoutMs ?? d.fetch.requestTimeoutMs,
        "fetch.requestTimeoutMs"
      ),
      pacing: {
        indexMs: assertNonNegativeInteger(pacing.indexMs ?? d.fetch.pacing.indexMs, "fetch.pacing.indexMs"),
        equityMs: assertNonNegativeInteger(pacing.equityMs ?? d.fetch.pacing.equityMs, "fetch.pacing.equityMs")
      }
    },
    output: {
      dir: path.resolve(rootDir, outputDir)
    }
  };
}

export async function loadMarketConfig(rootDir = process.cwd()): Promise<MarketConfig> {
  const filePath = path.join(rootDir, "config", "market.yml");
  const raw = await readFile(filePath, "utf8");

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${filePath}`, { cause: error });
  }

  return parseMarketConfig(parsed, rootDir);
}

export async function loadIndexInstruments(rootDir = process.cwd()): Promise<IndexInstrument[]> {
  const filePath = path.join(rootDir, "config", "indices.json");
  const json: unknown = JSON.parse(await readFile(filePath, "utf8"));
  if (!isRecord(json) || !Array.isArray(json.indices) || json.indices.length === 0) {
    throw new ConfigError("config/indices.json must contain { indices: { name, code }[] }");
  }

  const seen = new Set<string>();
  return json.indices.map((entry: unknown, i: number) => {
    if (!isRecord(entry)) {
      throw new ConfigError(`indices[${i}] must be an object`);
    }

    const name = assertString(entry.name, `indices[${i}].name`);
    const code = assertString(entry.code, `indices[${i}].code`);
    if (!/^\d{6}$/.test(code)) {
      throw new ConfigError(`indices[${i}].code must be a 6-digit code, got ${code}`);
    }
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate index name in config/indices.json: ${name}`);
    }
    seen.add(name);

    return { name, code };
  });
}
