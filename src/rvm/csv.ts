import { DataLoadError } from "../errors.js";
import { isValidCoordinates } from "./geo.js";
import type { RvmRecord, RvmStatus } from "./types.js";

export const CSV_COLUMNS = [
  "id",
  "name",
  "address",
  "latitude",
  "longitude",
  "status",
  "updated_at",
  "description",
  "hours",
  "nearby"
] as const;

const REQUIRED_COLUMNS = ["id", "name", "address", "latitude", "longitude", "status"] as const;

type Column = (typeof CSV_COLUMNS)[number];

const STATUS_ALIASES: Record<string, RvmStatus> = {
  working: "Working",
  notworking: "NotWorking",
  "not working": "NotWorking",
  full: "NotWorking",
  "out of order": "NotWorking",
  "other issues": "NotWorking",
  unknown: "Unknown",
  "": "Unknown"
};

/** Maps user or legacy status text onto the canonical enum; null when unrecognised. */
export function parseStatus(raw: string): RvmStatus | null {
  const key = raw.trim().toLowerCase().replace(/[\s_-]+/g, " ");
  return STATUS_ALIASES[key] ?? null;
}

function csvEscape(value: string): string {
  if (!/[,"\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/** RFC 4180 rows; quoted fields may span lines. */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cur = "";
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = () => {
    row.push(cur);
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
    cur = "";
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cur += '"';
          i++;
          continue;
        }
        inQuotes = false;
        continue;
      }
      cur += ch;
      continue;
    }
    if (ch === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
      continue;
    }
    if (ch === ",") {
      row.push(cur);
      cur = "";
      fieldStarted = false;
      continue;
    }
    if (ch === "\r" && text[i + 1] === "\n") continue;
    if (ch === "\n") {
      endRow();
      continue;
    }
    cur += ch;
    fieldStarted = true;
  }
  if (inQuotes) throw new DataLoadError("unterminated quoted field at end of file");
  if (cur !== "" || row.length) endRow();
  return rows;
}

function parseCoordinate(raw: string, column: "latitude" | "longitude", line: number): number {
  const s = raw.trim();
  const n = s === "" ? NaN : Number(s);
  if (!Number.isFinite(n)) throw new DataLoadError(`line ${line}: ${column} "${raw}" is not a number`);
  return n;
}

export function parseRvmCsv(text: string): RvmRecord[] {
  const rows = parseCsvRows(text.replace(/^\uFEFF/, ""));
  if (!rows.length) throw new DataLoadError("RVM table is empty");

  const header = rows[0].map((h) => h.trim().toLowerCase());
  const missing = REQUIRED_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length) throw new DataLoadError(`RVM table is missing columns: ${missing.join(", ")}`);

  const idx = (c: Column) => header.indexOf(c);
  const records: RvmRecord[] = [];
  const seen = new Set<string>();

  rows.slice(1).forEach((cols, i) => {
    const line = i + 2;
    const get = (c: Column): string => {
      const at = idx(c);
      return at >= 0 ? cols[at] ?? "" : "";
    };

    const id = get("id").trim();
    const name = get("name").trim();
    if (!id) throw new DataLoadError(`line ${line}: id is empty`);
    if (!name) throw new DataLoadError(`line ${line}: name is empty`);
    if (seen.has(id)) throw new DataLoadError(`line ${line}: duplicate id "${id}"`);

    const latitude = parseCoordinate(get("latitude"), "latitude", line);
    const longitude = parseCoordinate(get("longitude"), "longitude", line);
    if (!isValidCoordinates({ latitude, longitude })) {
      throw new DataLoadError(`line ${line}: coordinates (${latitude}, ${longitude}) out of range`);
    }

    const status = parseStatus(get("status"));
    if (!status) throw new DataLoadError(`line ${line}: unknown status "${get("status")}"`);

    const updatedAt = get("updated_at").trim();
    seen.add(id);
    records.push({
      id,
      name,
      address: get("address"),
      latitude,
      longitude,
      status,
      updatedAt: updatedAt || null,
      description: get("description"),
      hours: get("hours"),
      nearby: get("nearby")
    });
  });

  return records;
}

export function serializeRvmCsv(records: readonly RvmRecord[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const r of records) {
    const values: Record<Column, string> = {
      id: r.id,
      name: r.name,
      address: r.address,
      latitude: String(r.latitude),
      longitude: String(r.longitude),
      status: r.status,
      updated_at: r.updatedAt ?? "",
      description: r.description,
      hours: r.hours,
      nearby: r.nearby
    };
    lines.push(CSV_COLUMNS.map((c) => csvEscape(values[c])).join(","));
  }
  return `${lines.join("\n")}\n`;
}
