import test from "node:test";
import assert from "node:assert/strict";
import { DataLoadError } from "../errors.js";
import { parseCsvRows, parseRvmCsv, parseStatus, serializeRvmCsv } from "./csv.js";
import type { RvmRecord } from "./types.js";

const HEADER = "id,name,address,latitude,longitude,status";

test("parseCsvRows handles quotes, escaped quotes, CRLF and blank lines", () => {
  const rows = parseCsvRows('a,"b, c","say ""hi"""\r\n\r\n"multi\nline",2,3\n');
  assert.deepEqual(rows, [
    ["a", "b, c", 'say "hi"'],
    ["multi\nline", "2", "3"]
  ]);
});

test("parseCsvRows rejects an unterminated quote", () => {
  assert.throws(() => parseCsvRows('a,"b\n'), DataLoadError);
});

test("parseRvmCsv reads required and optional columns", () => {
  const records = parseRvmCsv(
    "\uFEFFID,Name,Address,Latitude,Longitude,Status,updated_at\n" +
      "r1, First ,Blk 1,1.30,103.80,working,\n" +
      "r2,Second,Blk 2,1.31,103.81,Full,2026-01-02T03:04:05.000Z\n"
  );
  assert.equal(records.length, 2);
  assert.deepEqual(records[0], {
    id: "r1",
    name: "First",
    address: "Blk 1",
    latitude: 1.3,
    longitude: 103.8,
    status: "Working",
    updatedAt: null,
    description: "",
    hours: "",
    nearby: ""
  });
  assert.equal(records[1].status, "NotWorking");
  assert.equal(records[1].updatedAt, "2026-01-02T03:04:05.000Z");
});

test("parseRvmCsv reports malformed tables with the line number", () => {
  assert.throws(() => parseRvmCsv(""), /RVM table is empty/);
  assert.throws(() => parseRvmCsv("id,name,address\n"), /missing columns: latitude, longitude, status/);
  assert.throws(() => parseRvmCsv(`${HEADER}\n,Name,Addr,1,2,Working\n`), /line 2: id is empty/);
  assert.throws(
    () => parseRvmCsv(`${HEADER}\nr1,A,Addr,1,2,Working\nr1,B,Addr,1,2,Working\n`),
    /line 3: duplicate id "r1"/
  );
  assert.throws(() => parseRvmCsv(`${HEADER}\nr1,A,Addr,north,2,Working\n`), /line 2: latitude "north" is not a number/);
  assert.throws(() => parseRvmCsv(`${HEADER}\nr1,A,Addr,91,2,Working\n`), /line 2: coordinates \(91, 2\) out of range/);
  assert.throws(() => parseRvmCsv(`${HEADER}\nr1,A,Addr,1,2,Broken\n`), /line 2: unknown status "Broken"/);
});

test("parseStatus maps legacy labels onto the three statuses", () => {
  assert.equal(parseStatus("Working"), "Working");
  assert.equal(parseStatus("Not Working"), "NotWorking");
  assert.equal(parseStatus("not_working"), "NotWorking");
  assert.equal(parseStatus("NotWorking"), "NotWorking");
  assert.equal(parseStatus("Out of Order"), "NotWorking");
  assert.equal(parseStatus("Other Issues"), "NotWorking");
  assert.equal(parseStatus(" "), "Unknown");
  assert.equal(parseStatus("maybe"), null);
});

test("serializeRvmCsv output parses back to the same records", () => {
  const records: RvmRecord[] = [
    {
      id: "r1",
      name: 'The "Big" Mall',
      address: "10 Main Road, #01-02",
      latitude: 1.3012,
      longitude: 103.8045,
      status: "NotWorking",
      updatedAt: "2026-10-01T00:00:00.000Z",
      description: "Level 1\nnear the lift",
      hours: "24 hours",
      nearby: "none"
    }
  ];
  const text = serializeRvmCsv(records);
  assert.equal(text.split("\n")[0], "id,name,address,latitude,longitude,status,updated_at,description,hours,nearby");
  assert.deepEqual(parseRvmCsv(text), records);
});
