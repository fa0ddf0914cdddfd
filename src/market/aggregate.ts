import { createPacer, mapWithConcurrency } from "./concurrency";
import { errorKind, errorMessage } from "./errors";
import { computeReturnStats } from "./stats";
import type {
  EntityFailure,
  FailureStage,
  IndexInstrument,
  InstrumentKind,
  InstrumentRef,
  PriceAdjustment,
  ReportWindow,
  ReturnStats,
  SeriesFetcher,
  TimeSeriesRecord
} from "./types";

export type AggregateOptions = {
  window: ReportWindow;
  adjust: PriceAdjustment;
  concurrency?: number;
  /**
  * Minimum spacing between consecutive fetch starts, shared by all workers.
  */
  pacingMs?: number;
  /**
  * Overrides `pacingMs`; lets several batches share one rate limit.
  */
  pacer?: () => Promise<void>;
};

type InstrumentOutcome =
  | { status: "ok"; ref: InstrumentRef; stats: ReturnStats; series: TimeSeriesRecord }
  | { status: "failed"; ref: InstrumentRef; failure: EntityFailure; series: TimeSeriesRecord | null };

export type UniverseAggregate = {
  table: ReturnStats[];
  failures: EntityFailure[];
  /**
  * Raw records that came back with at least one bar, in input order. Kept for export only.
  */
  series: TimeSeriesRecord[];
};

export type IndexAggregate = {
  stats: Map<string, ReturnStats>;
  failures: EntityFailure[];
  series: Map<string, TimeSeriesRecord>;
};

function toFailure(ref: InstrumentRef, stage: FailureStage, error: unknown): EntityFailure {
  return {
    code: ref.code,
    name: ref.name,
    stage,
    kind: errorKind(error),
    reason: errorMessage(error)
  };
}

function tag(kind: InstrumentKind): string {
  return kind === "index" ? "[market:index]" : "[market:equity]";
}

async function collectOutcomes(
  refs: readonly InstrumentRef[],
  kind: InstrumentKind,
  fetcher: SeriesFetcher,
  opts: AggregateOptions,
  keyOf: (ref: InstrumentRef) => string
): Promise<InstrumentOutcome[]> {
  const gate = opts.pacer ?? createPacer(opts.pacingMs ?? 0);

  const outcomes = await mapWithConcurrency(refs, opts.concurrency ?? 1, async (ref): Promise<InstrumentOutcome> => {
    let series: TimeSeriesRecord;
    try {
      await gate();
      series = await fetcher.fetchSeries(ref.code, {
        kind,
        name: ref.name,
        startDate: opts.window.startDate,
        endDate: opts.window.endDate,
        adjust: opts.adjust
      });
    } catch (error) {
      const failure = toFailure(ref, "fetch", error);
      console.error(`${tag(kind)} ✗ ${ref.code} ${ref.name}: ${failure.reason}`);
      return { status: "failed", ref, failure, series: null };
    }

    const kept = series.dates.length > 0 ? series : null;
    const res = computeReturnStats(series);
    if (res.status === "failed") {
      const failure = toFailure(ref, "stats", res.error);
      console.error(`${tag(kind)} ✗ ${ref.code} ${ref.name}: ${failure.reason}`);
      return { status: "failed", ref, failure, series: kept };
    }

    console.log(`${tag(kind)} ✓ ${ref.code} ${ref.name}: ${series.dates.length} bars`);
    return { status: "ok", ref, stats: res.stats, series };
  });

  return dedupeLastWins(outcomes, (o) => keyOf(o.ref));
}

function dedupeLastWins<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const item of items) {
    const key = keyOf(item);
    // Re-inserting moves the key to the end, so the survivor keeps its own input position.
    byKey.delete(key);
    byKey.set(key, item);
  }
  return Array.from(byKey.values());
}

export async function aggregateUniverse(
  symbols: readonly InstrumentRef[],
  fetcher: SeriesFetcher,
  opts: AggregateOptions
): Promise<UniverseAggregate> {
  const outcomes = await collectOutcomes(symbols, "equity", fetcher, opts, (ref) => ref.code);

  const table: ReturnStats[] = [];
  const failures: EntityFailure[] = [];
  const series: TimeSeriesRecord[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      table.push(outcome.stats);
    } else {
      failures.push(outcome.failure);
    }
    if (outcome.series) {
      series.push(outcome.series);
    }
  }

  return { table, failures, series };
}

/**
* Fetches and summarizes the index instruments. `stats` and `series` are keyed by index
* name and iterate in the order of `instruments`.
*/
export async function aggregateIndices(
  instruments: readonly IndexInstrument[],
  fetcher: SeriesFetcher,
  opts: AggregateOptions
): Promise<IndexAggregate> {
  // Indices are keyed by name; two names may share a code and each is reported.
  const byName = dedupeLastWins(instruments, (i) => i.name);
  const outcomes = await collectOutcomes(byName, "index", fetcher, opts, (ref) => ref.name);

  const stats = new Map<string, ReturnStats>();
  const failures: EntityFailure[] = [];
  const series = new Map<string, TimeSeriesRecord>();
  for (const outcome of outcomes) {
    if (outcome.status === "ok") {
      stats.set(outcome.ref.name, outcome.stats);
    } else {
      failures.push(outcome.failure);
    }
    if (outcome.series) {
      series.set(outcome.ref.name, outcome.series);
    }
  }

  return { stats, failures, series };
}
