import { aggregateIndices, aggregateUniverse } from "./aggregate";
import type { MarketConfig } from "./config";
import { resolveReportWindow } from "./date";
import { ListingUnavailableError } from "./errors";
import { EastmoneyMarketDataProvider } from "./providers/eastmoney";
import { YahooMarketDataProvider } from "./providers/yahoo";
import { buildMarketReport, renderReportText } from "./report";
import { writeReportArtifacts, type ExportPaths } from "./storage";
import type { IndexInstrument, ListingProvider, ListingSnapshot, ReportWindow, SeriesFetcher } from "./types";
import { selectUniverse } from "./universe";

export type MarketProviders = {
  listing: ListingProvider;
  series: SeriesFetcher;
};

export type MarketRunSummary = {
  window: ReportWindow;
  seriesProvider: string;
  listed: number;
  indices: { requested: number; analyzed: number };
  equities: { requested: number; analyzed: number };
  failedCodes: string[];
  outputs: ExportPaths;
};

export function createMarketProviders(cfg: MarketConfig): MarketProviders {
  const eastmoney = new EastmoneyMarketDataProvider({ timeoutMs: cfg.fetch.requestTimeoutMs });
  return {
    listing: eastmoney,
    series: cfg.fetch.seriesProvider === "yahoo" ? new YahooMarketDataProvider() : eastmoney
  };
}

async function loadListing(provider: ListingProvider): Promise<ListingSnapshot> {
  try {
    return await provider.fetchListing();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ListingUnavailableError(message, { cause: error });
  }
}

/**
* One report run: listing, index series, top-N equity series, report, export.
*
* Per-instrument failures are collected into the report. A missing listing aborts before
* anything is fetched; export failures propagate.
*/
export async function runMarketReport(args: {
  config: MarketConfig;
  indices: IndexInstrument[];
  now?: Date;
  providers?: MarketProviders;
}): Promise<MarketRunSummary> {
  const cfg = args.config;
  const providers = args.providers ?? createMarketProviders(cfg);
  const window = resolveReportWindow(args.now ?? new Date(), cfg.window.lookbackDays, cfg.window.timeZone);

  console.log(`[market:run] window ${window.startDate} → ${window.endDate} (series: ${providers.series.provider})`);

  const listing = await loadListing(providers.listing);
  console.log(`[market:listing] ${listing.rows.length} listed A-shares`);

  const indices = await aggregateIndices(args.indices, providers.series, {
    window,
    adjust: cfg.fetch.adjust,
    concurrency: cfg.fetch.concurrency,
    pacingMs: cfg.fetch.pacing.indexMs
  });

  const universe = selectUniverse(listing, cfg.universe.size);
  console.log(`[market:equity] fetching top ${universe.length} by total market cap`);

  const equities = await aggregateUniverse(universe, providers.series, {
    window,
    adjust: cfg.fetch.adjust,
    concurrency: cfg.fetch.concurrency,
    pacingMs: cfg.fetch.pacing.equityMs
  });

  const requestedIndices = new Set(args.indices.map((i) => i.name)).size;
  const requestedEquities = new Set(universe.map((u) => u.code)).size;
  const failures = [...indices.failures, ...equities.failures];

  const report = buildMarketReport({
    window,
    indexStats: indices.stats,
    equityTable: equities.table,
    listing,
    failures,
    requested: { indices: requestedIndices, equities: requestedEquities }
  });
  const reportText = renderReportText(report);
  console.log(reportText);

  const outputs = await writeReportArtifacts(cfg.output.dir, {
    report,
    reportText,
    indexSeries: indices.series,
    equitySeries: equities.series,
    listing
  });

  return {
    window,
    seriesProvider: providers.series.provider,
    listed: listing.rows.length,
    indices: { requested: requestedIndices, analyzed: indices.stats.size },
    equities: { requested: requestedEquities, analyzed: equities.table.length },
    failedCodes: failures.map((f) => f.code),
    outputs
  };
}
