import { z } from "zod";
import { GeocodeError } from "../errors.js";
import { logger } from "../logger.js";
import type { Coordinates } from "../types.js";
import { errorMessage, timeoutSignal } from "../utils/async.js";

export interface Geocoder {
  geocode(query: string): Promise<Coordinates>;
}

const searchResponseSchema = z.object({
  found: z.coerce.number(),
  results: z.array(
    z.object({
      SEARCHVAL: z.string().optional(),
      LATITUDE: z.coerce.number(),
      LONGITUDE: z.coerce.number()
    })
  )
});

const QUERY_PATTERN = /^[A-Za-z0-9 ]+$/;

export function normalizeQuery(query: string): string | null {
  const q = String(query ?? "").trim().replace(/\s+/g, " ");
  if (!q || q.length > 100) return null;
  if (!QUERY_PATTERN.test(q)) return null;
  return q;
}

/** Resolves place names, building names and postal codes through the OneMap search API. */
export class OneMapGeocoder implements Geocoder {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchFn: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async geocode(query: string): Promise<Coordinates> {
    const q = normalizeQuery(query);
    if (!q) throw new GeocodeError(`unsupported query: ${JSON.stringify(query)}`);

    const params = new URLSearchParams({
      searchVal: q,
      returnGeom: "Y",
      getAddrDetails: "Y",
      pageNum: "1"
    });
    const url = `${this.baseUrl}/api/common/elastic/search?${params.toString()}`;

    let json: unknown;
    try {
      const res = await this.fetchFn(url, { method: "GET", signal: timeoutSignal(this.timeoutMs) });
      if (!res.ok) throw new GeocodeError(`OneMap search failed: HTTP ${res.status}`);
      json = await res.json();
    } catch (err) {
      if (err instanceof GeocodeError) throw err;
      throw new GeocodeError(`OneMap search failed: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = searchResponseSchema.safeParse(json);
    if (!parsed.success) throw new GeocodeError("OneMap search returned an unexpected body");
    const first = parsed.data.results[0];
    if (parsed.data.found <= 0 || !first) throw new GeocodeError(`no results for "${q}"`);

    logger.debug({ query: q, match: first.SEARCHVAL }, "geocoded query");
    return { latitude: first.LATITUDE, longitude: first.LONGITUDE };
  }
}
