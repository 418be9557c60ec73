// src/services/geocode.ts
// Capital-city lookup for the detail map. Not part of the aggregation pipeline.

import { z } from "zod";
import { config as defaultConfig, type AtlasConfig } from "../config";
import { fetchJson } from "./http";

export type GeoPoint = { lat: number; lon: number; label?: string };

/** [[south, west], [north, east]] */
export type GeoBounds = [[number, number], [number, number]];

export interface Geocoder {
  locate(query: string, opt?: { signal?: AbortSignal }): Promise<GeoPoint | null>;
}

const NominatimResults = z.array(
  z.object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  })
);

export function createNominatimGeocoder(cfg: AtlasConfig = defaultConfig): Geocoder {
  return {
    async locate(query, opt = {}) {
      const q = query.trim();
      if (!q) return null;
      const url = `${cfg.geocoderUrl}/search?format=json&limit=1&q=${encodeURIComponent(q)}`;
      const [first] = await fetchJson(url, { schema: NominatimResults, signal: opt.signal });
      if (!first) return null;
      return { lat: first.lat, lon: first.lon, label: first.display_name };
    },
  };
}

export const nominatimGeocoder = createNominatimGeocoder();

const clamp = (v: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, v));

/** Square region of `span` degrees centred on the point. */
export function regionAround(p: GeoPoint, span = 10): GeoBounds {
  const h = span / 2;
  return [
    [clamp(p.lat - h, -90, 90), clamp(p.lon - h, -180, 180)],
    [clamp(p.lat + h, -90, 90), clamp(p.lon + h, -180, 180)],
  ];
}
