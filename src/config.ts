// src/config.ts
// Runtime settings for the World Bank feeds and the capital geocoder.
// Values come from Vite env variables (see .env.example) and fall back to defaults.

import { z } from "zod";

const ConfigSchema = z.object({
  wbBaseUrl: z.string().url().default("https://api.worldbank.org/v2"),
  /** Year of the indicator observations. */
  dataYear: z.coerce.number().int().min(1960).default(2022),
  /** Single page size; the whole directory fits one page. */
  perPage: z.coerce.number().int().positive().max(1000).default(300),
  geocoderUrl: z.string().min(1).default("https://nominatim.openstreetmap.org"),
});

export type AtlasConfig = z.infer<typeof ConfigSchema>;

export const INDICATORS = {
  population: "SP.POP.TOTL",
  gdp: "NY.GDP.MKTP.CD",
} as const;

export type IndicatorKey = keyof typeof INDICATORS;

type EnvLike = {
  VITE_WB_BASE_URL?: string;
  VITE_WB_DATA_YEAR?: string;
  VITE_WB_PER_PAGE?: string;
  VITE_GEOCODER_URL?: string;
};

export function loadConfig(env: EnvLike = import.meta.env): AtlasConfig {
  const parsed = ConfigSchema.safeParse({
    wbBaseUrl: env.VITE_WB_BASE_URL || undefined,
    dataYear: env.VITE_WB_DATA_YEAR || undefined,
    perPage: env.VITE_WB_PER_PAGE || undefined,
    geocoderUrl: env.VITE_GEOCODER_URL || undefined,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}

export const config = loadConfig();
