import { GeocodeError, NotFoundError } from "../errors.js";
import type { Geocoder } from "../geocode/oneMap.js";
import { logger } from "../logger.js";
import type { Coordinates } from "../types.js";
import { distanceMeters } from "./geo.js";
import type { RvmStorage } from "./storage.js";
import type { RankedRvm, RvmRecord, RvmStatus } from "./types.js";

function byDistanceThenId(a: RankedRvm, b: RankedRvm): number {
  if (a.distanceMeters !== b.distanceMeters) return a.distanceMeters - b.distanceMeters;
  if (a.record.id < b.record.id) return -1;
  if (a.record.id > b.record.id) return 1;
  return 0;
}

/**
 * In-memory RVM table. Owns the records for the lifetime of the process:
 * loaded once at startup, written back through the storage after every
 * status change and again on shutdown. Callers only ever see copies.
 */
export class RvmDataset {
  private records: RvmRecord[] = [];
  private readonly byId = new Map<string, RvmRecord>();

  constructor(
    private readonly storage: RvmStorage,
    private readonly geocoder?: Geocoder
  ) {}

  load(): number {
    const records = this.storage.read();
    this.records = records;
    this.byId.clear();
    for (const r of records) this.byId.set(r.id, r);
    logger.info({ source: this.storage.location, count: records.length }, "RVM table loaded");
    return records.length;
  }

  get size(): number {
    return this.records.length;
  }

  get(id: string): RvmRecord | undefined {
    const r = this.byId.get(id);
    return r ? { ...r } : undefined;
  }

  all(): RvmRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  nearestK(origin: Coordinates, k: number): RankedRvm[] {
    if (k <= 0 || !this.records.length) return [];

    // Partial selection: keep the k best seen so far, sorted.
    const best: RankedRvm[] = [];
    for (const record of this.records) {
      const candidate = { record, distanceMeters: distanceMeters(origin, record) };
      if (best.length === k && byDistanceThenId(candidate, best[k - 1]) >= 0) continue;
      let i = best.length;
      while (i > 0 && byDistanceThenId(candidate, best[i - 1]) < 0) i--;
      best.splice(i, 0, candidate);
      if (best.length > k) best.pop();
    }
    return best.map((r) => ({ record: { ...r.record }, distanceMeters: r.distanceMeters }));
  }

  async findByQuery(query: string, k: number): Promise<{ origin: Coordinates; results: RankedRvm[] }> {
    if (!this.geocoder) throw new GeocodeError("no geocoder configured");
    const origin = await this.geocoder.geocode(query);
    return { origin, results: this.nearestK(origin, k) };
  }

  updateStatus(id: string, status: RvmStatus, at: Date = new Date()): RvmRecord {
    const rec = this.byId.get(id);
    if (!rec) throw new NotFoundError(id);
    const prev = { status: rec.status, updatedAt: rec.updatedAt };
    rec.status = status;
    rec.updatedAt = at.toISOString();
    try {
      this.persist();
    } catch (err) {
      rec.status = prev.status;
      rec.updatedAt = prev.updatedAt;
      throw err;
    }
    logger.info({ id, status }, "RVM status updated");
    return { ...rec };
  }

  persist(): void {
    this.storage.write(this.records);
  }
}
