import { z } from "zod";
import type { Coordinates } from "./types.js";

export interface GeocoderOptions {
  url: string;
  userAgent: string;
  delayMs?: number;
  fetch?: typeof fetch;
}

export type Geocoder = (name: string) => Promise<Coordinates | null>;

// Nominatim /search?format=jsonv2 returns coordinates as strings
const searchResponseSchema = z.array(
  z.object({
    lat: z.coerce.number().min(-90).max(90),
    lon: z.coerce.number().min(-180).max(180),
  })
);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function searchUrl(baseUrl: string, name: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/search?q=${encodeURIComponent(name)}&format=jsonv2&limit=1`;
}

export function createGeocoder(options: GeocoderOptions): Geocoder {
  const fetchImpl = options.fetch ?? fetch;
  const delayMs = options.delayMs ?? 1000;

  return async (name) => {
    try {
      const response = await fetchImpl(searchUrl(options.url, name), {
        headers: {
          accept: "application/json",
          "user-agent": options.userAgent,
        },
      });
      if (!response.ok) {
        throw new Error(`geocoder responded ${response.status} ${response.statusText}`.trim());
      }

      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("unexpected geocoder response");
      }
      const [first] = parsed.data;
      return first ? { latitude: first.lat, longitude: first.lon } : null;
    } finally {
      if (delayMs > 0) await sleep(delayMs);
    }
  };
}
