import test from "node:test";
import assert from "node:assert/strict";
import { GeocodeError } from "../errors.js";
import { normalizeQuery, OneMapGeocoder } from "./oneMap.js";

function fakeFetch(status: number, body: unknown, seen: string[] = []): typeof fetch {
  return async (input) => {
    seen.push(String(input));
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
  };
}

test("normalizeQuery trims, collapses spaces and rejects symbols", () => {
  assert.equal(normalizeQuery("  Maple   Court  "), "Maple Court");
  assert.equal(normalizeQuery("123456"), "123456");
  assert.equal(normalizeQuery("Blk 5; DROP"), null);
  assert.equal(normalizeQuery("   "), null);
  assert.equal(normalizeQuery("a".repeat(101)), null);
});

test("geocode returns the first result's coordinates", async () => {
  const seen: string[] = [];
  const geocoder = new OneMapGeocoder(
    "https://maps.example.test/",
    1000,
    fakeFetch(200, { found: 2, results: [{ SEARCHVAL: "MAPLE COURT", LATITUDE: "1.3012", LONGITUDE: "103.8045" }, { LATITUDE: "0", LONGITUDE: "0" }] }, seen)
  );
  assert.deepEqual(await geocoder.geocode(" Maple  Court "), { latitude: 1.3012, longitude: 103.8045 });
  assert.equal(
    seen[0],
    "https://maps.example.test/api/common/elastic/search?searchVal=Maple+Court&returnGeom=Y&getAddrDetails=Y&pageNum=1"
  );
});

test("geocode fails with GeocodeError when nothing matches", async () => {
  const geocoder = new OneMapGeocoder("https://maps.example.test", 1000, fakeFetch(200, { found: 0, results: [] }));
  await assert.rejects(geocoder.geocode("Nowhere"), { name: "GeocodeError", message: 'no results for "Nowhere"' });
});

test("geocode fails with GeocodeError on HTTP errors and bad bodies", async () => {
  await assert.rejects(
    new OneMapGeocoder("https://maps.example.test", 1000, fakeFetch(503, {})).geocode("Maple"),
    { message: "OneMap search failed: HTTP 503" }
  );
  await assert.rejects(
    new OneMapGeocoder("https://maps.example.test", 1000, fakeFetch(200, { results: "nope" })).geocode("Maple"),
    GeocodeError
  );
});

test("geocode rejects unsupported queries without calling the API", async () => {
  const seen: string[] = [];
  const geocoder = new OneMapGeocoder("https://maps.example.test", 1000, fakeFetch(200, {}, seen));
  await assert.rejects(geocoder.geocode("<script>"), GeocodeError);
  assert.deepEqual(seen, []);
});
