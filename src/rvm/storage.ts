import fs from "node:fs";
import { DataLoadError } from "../errors.js";
import { atomicWriteText } from "../utils/fs.js";
import { parseRvmCsv, serializeRvmCsv } from "./csv.js";
import type { RvmRecord } from "./types.js";

export interface RvmStorage {
  readonly location: string;
  read(): RvmRecord[];
  write(records: readonly RvmRecord[]): void;
}

export class CsvFileStorage implements RvmStorage {
  constructor(readonly location: string) {}

  read(): RvmRecord[] {
    let raw: string;
    try {
      raw = fs.readFileSync(this.location, "utf8");
    } catch (err) {
      throw new DataLoadError(`cannot read RVM table ${this.location}`, { cause: err });
    }
    try {
      return parseRvmCsv(raw);
    } catch (err) {
      if (err instanceof DataLoadError) {
        throw new DataLoadError(`${this.location}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  write(records: readonly RvmRecord[]): void {
    atomicWriteText(this.location, serializeRvmCsv(records));
  }
}
