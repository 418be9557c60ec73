// src/services/aggregate.ts
// Directory + population + GDP -> enriched, filtered, region-grouped countries.

import { INDICATORS } from "../config";
import { AggregationError, DirectoryFetchError, TransportError } from "./errors";
import { logError, logWarn } from "./log";
import {
  fetchCountryDirectory,
  fetchIndicatorTable,
  type CountryEntry,
  type IndicatorTable,
  type WbFetchOptions,
} from "./worldBank";

/** Region label (trimmed) -> countries in pipeline order. Frozen once built. */
export type GroupedResult = Readonly<Record<string, readonly CountryEntry[]>>;

export type AggregationResult =
  | { ok: true; regions: GroupedResult }
  | { ok: false; error: AggregationError };

export type AggregatorDeps = {
  fetchDirectory: (opt: WbFetchOptions) => Promise<CountryEntry[]>;
  fetchIndicator: (indicator: string, opt: WbFetchOptions) => Promise<IndicatorTable>;
};

export const defaultDeps: AggregatorDeps = {
  fetchDirectory: fetchCountryDirectory,
  fetchIndicator: fetchIndicatorTable,
};

/** Region id the directory uses for non-country rows. */
export const NOT_APPLICABLE_REGION = "NA";

export function enrichEntry(
  entry: CountryEntry,
  population: IndicatorTable,
  gdp: IndicatorTable
): CountryEntry {
  const pop = population.get(entry.code);
  const g = gdp.get(entry.code);
  return Object.freeze({
    ...entry,
    ...(pop !== undefined ? { population: Math.trunc(pop) } : {}),
    ...(g !== undefined ? { gdp: g } : {}),
  });
}

export function isCountry(entry: CountryEntry): boolean {
  return (
    !entry.region.value.toLowerCase().includes("aggregate") &&
    entry.region.id !== NOT_APPLICABLE_REGION &&
    entry.capitalCity !== ""
  );
}

/** Freeze the result, its region lists and their entries. */
export function freezeGrouped(
  groups: Iterable<readonly [string, readonly CountryEntry[]]>
): GroupedResult {
  // fromEntries defines own properties, so labels such as "__proto__" stay plain keys
  return Object.freeze(
    Object.fromEntries(
      [...groups].map(
        ([label, list]) => [label, Object.freeze(list.map((e) => Object.freeze(e)))] as const
      )
    )
  );
}

export function groupByRegion(entries: readonly CountryEntry[]): GroupedResult {
  const grouped = new Map<string, CountryEntry[]>();
  for (const e of entries) {
    const label = e.region.value.trim();
    const list = grouped.get(label);
    if (list) list.push(e);
    else grouped.set(label, [e]);
  }
  return freezeGrouped(grouped);
}

/** Merge, filter and group; synchronous. */
export function buildGroupedResult(
  directory: readonly CountryEntry[],
  population: IndicatorTable,
  gdp: IndicatorTable
): GroupedResult {
  const enriched = directory.map((e) => enrichEntry(e, population, gdp));
  return groupByRegion(enriched.filter(isCountry));
}

// Indicator rows are joined on the two-letter code. Codes that match no
// directory entry point at a code-space mismatch between the feeds.
function auditCodeSpaces(directory: readonly CountryEntry[], tables: Record<string, IndicatorTable>) {
  const known = new Set(directory.map((e) => e.code));
  for (const [name, table] of Object.entries(tables)) {
    const orphans = [...table.keys()].filter((code) => !known.has(code));
    if (orphans.length) {
      logWarn(
        `${orphans.length} ${name} codes match no directory entry (${orphans.slice(0, 5).join(", ")})`,
        "aggregate"
      );
    }
  }
}

// Indicators are best-effort: a rejecting fetcher degrades to an empty table.
function absorbIndicator(
  indicator: string,
  fetchIndicator: AggregatorDeps["fetchIndicator"],
  opt: WbFetchOptions
): Promise<IndicatorTable> {
  let pending: Promise<IndicatorTable>;
  try {
    pending = fetchIndicator(indicator, opt);
  } catch (err) {
    pending = Promise.reject(err);
  }
  return pending.catch((err: unknown) => {
    if (!opt.signal?.aborted) logError(err, `indicator:${indicator}`);
    return new Map<string, number>();
  });
}

/**
 * Fetch the three feeds concurrently and build the grouped result.
 * Only a directory failure fails the run.
 */
export async function aggregateCountries(
  deps: AggregatorDeps = defaultDeps,
  opt: WbFetchOptions = {}
): Promise<AggregationResult> {
  // all three requests are in flight before the first await
  const directoryP = deps.fetchDirectory(opt);
  const populationP = absorbIndicator(INDICATORS.population, deps.fetchIndicator, opt);
  const gdpP = absorbIndicator(INDICATORS.gdp, deps.fetchIndicator, opt);

  let directory: CountryEntry[];
  try {
    directory = await directoryP;
  } catch (err) {
    const cause =
      err instanceof DirectoryFetchError
        ? err
        : new DirectoryFetchError(
            new TransportError(err instanceof Error ? err.message : String(err), {
              url: "directory",
              cause: err,
            })
          );
    return { ok: false, error: new AggregationError("DirectoryUnavailable", cause) };
  }

  const [population, gdp] = await Promise.all([populationP, gdpP]);
  auditCodeSpaces(directory, { population, gdp });

  return { ok: true, regions: buildGroupedResult(directory, population, gdp) };
}
