// src/services/worldBank.ts
// World Bank API v2: country directory and all-country indicator tables.

import { z } from "zod";
import { config as defaultConfig, type AtlasConfig } from "../config";
import { DirectoryFetchError, TransportError, isFetchFailure } from "./errors";
import { fetchJson } from "./http";
import { logError } from "./log";

export type RegionDescriptor = { readonly id: string; readonly value: string };

export type CountryEntry = {
  readonly id: string;
  /** Two-letter code; the join key for indicator tables. */
  readonly code: string;
  readonly name: string;
  readonly capitalCity: string;
  readonly region: RegionDescriptor;
  readonly population?: number;
  readonly gdp?: number;
};

export type IndicatorRecord = {
  country: { id: string };
  countryiso3code?: string;
  value?: number | null;
};

export type IndicatorTable = ReadonlyMap<string, number>;

export type WbFetchOptions = {
  signal?: AbortSignal;
  config?: AtlasConfig;
};

// The two endpoint families encode per_page differently ("300" vs 300),
// so each gets its own metadata schema.
const DirectoryPageMeta = z.object({
  page: z.number(),
  pages: z.number(),
  per_page: z.string(),
  total: z.number(),
});

const IndicatorPageMeta = z.object({
  page: z.number(),
  pages: z.number(),
  per_page: z.number(),
  total: z.number(),
  lastupdated: z.string(),
});

const DirectoryEntry = z
  .object({
    id: z.string(),
    iso2Code: z.string().min(1),
    name: z.string(),
    region: z.object({ id: z.string(), value: z.string() }),
    capitalCity: z.string(),
  })
  .transform(
    (raw): CountryEntry => ({
      id: raw.id,
      code: raw.iso2Code,
      name: raw.name,
      capitalCity: raw.capitalCity,
      region: { id: raw.region.id, value: raw.region.value },
    })
  );

const DirectoryEntries = z.array(DirectoryEntry).superRefine((entries, ctx) => {
  const seen = new Set<string>();
  entries.forEach((e, i) => {
    if (seen.has(e.code)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, "iso2Code"],
        message: `duplicate country code ${e.code}`,
      });
    }
    seen.add(e.code);
  });
});

const IndicatorRecordSchema: z.ZodType<IndicatorRecord> = z.object({
  country: z.object({ id: z.string() }),
  countryiso3code: z.string().optional(),
  value: z.number().nullable().optional(),
});

// WB answers bad requests with 200 and [{ message: [{ id, key, value }] }]
const ProviderMessage = z.tuple([
  z.object({
    message: z.array(z.object({ id: z.string(), key: z.string(), value: z.string() })).min(1),
  }),
]);

function withProviderMessages<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((json, ctx) => {
    const msg = ProviderMessage.safeParse(json);
    if (msg.success) {
      const text = msg.data[0].message.map((m) => m.value.trim()).join("; ");
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `provider error: ${text}`, fatal: true });
      return z.NEVER;
    }
    return json;
  }, schema);
}

const DirectoryResponse = withProviderMessages(
  z.tuple([DirectoryPageMeta, DirectoryEntries]).transform(([, entries]) => entries)
);

const IndicatorResponse = withProviderMessages(
  z
    .tuple([IndicatorPageMeta, z.array(IndicatorRecordSchema).nullable()])
    .transform(([, records]) => records ?? [])
);

export function directoryUrl(cfg: AtlasConfig = defaultConfig) {
  return `${cfg.wbBaseUrl}/country?format=json&per_page=${cfg.perPage}`;
}

export function indicatorUrl(indicator: string, cfg: AtlasConfig = defaultConfig) {
  return `${cfg.wbBaseUrl}/country/all/indicator/${encodeURIComponent(
    indicator
  )}?format=json&date=${cfg.dataYear}&per_page=${cfg.perPage}`;
}

/**
 * Full country directory, aggregates included. Any failure is fatal and
 * surfaces as DirectoryFetchError.
 */
export async function fetchCountryDirectory(opt: WbFetchOptions = {}): Promise<CountryEntry[]> {
  const url = directoryUrl(opt.config);
  try {
    return await fetchJson(url, { schema: DirectoryResponse, signal: opt.signal });
  } catch (err) {
    if (isFetchFailure(err)) throw new DirectoryFetchError(err);
    throw new DirectoryFetchError(
      new TransportError(err instanceof Error ? err.message : String(err), { url, cause: err })
    );
  }
}

/** Reduce records to code -> value; the last observation per code wins. */
export function toIndicatorTable(records: Iterable<IndicatorRecord>): IndicatorTable {
  const table = new Map<string, number>();
  for (const r of records) {
    if (r.value == null) continue;
    table.set(r.country.id, r.value);
  }
  return table;
}

/**
 * One indicator for every country. Best-effort: failures are logged and
 * an empty table is returned.
 */
export async function fetchIndicatorTable(
  indicator: string,
  opt: WbFetchOptions = {}
): Promise<IndicatorTable> {
  try {
    const records = await fetchJson(indicatorUrl(indicator, opt.config), {
      schema: IndicatorResponse,
      signal: opt.signal,
    });
    return toIndicatorTable(records);
  } catch (err) {
    if (!opt.signal?.aborted) logError(err, `indicator:${indicator}`);
    return new Map();
  }
}
