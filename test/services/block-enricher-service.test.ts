import {
  enrichBlock,
  enrichBlocks,
  resolveCountry,
  toBlockRecord,
} from "../../src/services/block-enricher-service";
import { buildLocationIndex } from "../../src/services/location-index-service";
import { MalformedNetworkError } from "../../src/services/merge-errors";
import { blockRow, locationRows, TEST_TIMESTAMP } from "../fixtures/geoip-fixture";

describe("BlockEnricherService", () => {
  const index = buildLocationIndex(locationRows);

  describe("toBlockRecord", () => {
    test("should parse numeric location references", () => {
      expect(toBlockRecord(blockRow("192.0.2.0/24", "100", " 200", "300"))).toEqual({
        network: "192.0.2.0/24",
        primaryLocationId: 100,
        registeredCountryLocationId: 200,
        representedCountryLocationId: 300,
      });
    });

    test("should leave blank and non-numeric references undefined", () => {
      const record = toBlockRecord(blockRow("192.0.2.0/24", "", "n/a", "  "));

      expect(record.primaryLocationId).toBeUndefined();
      expect(record.registeredCountryLocationId).toBeUndefined();
      expect(record.representedCountryLocationId).toBeUndefined();
    });

    test("should tolerate missing columns", () => {
      expect(toBlockRecord({ network: "192.0.2.0/24" })).toEqual({
        network: "192.0.2.0/24",
        primaryLocationId: undefined,
        registeredCountryLocationId: undefined,
        representedCountryLocationId: undefined,
      });
    });
  });

  describe("resolveCountry", () => {
    test("should prefer the block's own location over the registered country", () => {
      const block = toBlockRecord(blockRow("192.0.2.0/24", "100", "200"));

      expect(resolveCountry(index, block)).toEqual({
        code: "AA",
        name: "Alphaland",
      });
    });

    test("should fall back to the registered country", () => {
      const block = toBlockRecord(blockRow("192.0.2.0/24", "", "200", "300"));

      expect(resolveCountry(index, block)).toEqual({
        code: "BB",
        name: "Betastan",
      });
    });

    test("should skip ids missing from the index", () => {
      const block = toBlockRecord(blockRow("192.0.2.0/24", "999", "888", "300"));

      expect(resolveCountry(index, block)).toEqual({
        code: "CC",
        name: "Gamma, Republic of",
      });
    });

    test("should return empty fields when nothing resolves", () => {
      expect(
        resolveCountry(index, toBlockRecord(blockRow("192.0.2.0/24")))
      ).toEqual({ code: "", name: "" });
      expect(
        resolveCountry(
          index,
          toBlockRecord(blockRow("192.0.2.0/24", "1", "2", "3"))
        )
      ).toEqual({ code: "", name: "" });
    });

    test("should stop at a location whose country fields are empty", () => {
      const block = toBlockRecord(blockRow("192.0.2.0/24", "400", "100"));

      expect(resolveCountry(index, block)).toEqual({ code: "", name: "" });
    });
  });

  describe("enrichBlock", () => {
    test("should compute the range and decimal bounds", () => {
      expect(
        enrichBlock(index, blockRow("198.51.100.0/24", "100"), TEST_TIMESTAMP, 1)
      ).toEqual({
        lastChanged: TEST_TIMESTAMP,
        network: "198.51.100.0/24",
        startIp: "198.51.100.0",
        endIp: "198.51.100.255",
        from: 3325256704,
        to: 3325256959,
        code: "AA",
        name: "Alphaland",
      });
    });

    test("should omit decimal bounds when disabled", () => {
      const record = enrichBlock(
        index,
        blockRow("203.0.113.128/25", "", "200"),
        TEST_TIMESTAMP,
        1,
        { includeDecimal: false }
      );

      expect(record).toEqual({
        lastChanged: TEST_TIMESTAMP,
        network: "203.0.113.128/25",
        startIp: "203.0.113.128",
        endIp: "203.0.113.255",
        code: "BB",
        name: "Betastan",
      });
    });

    test("should mask host bits but keep the network as given", () => {
      const record = enrichBlock(index, blockRow("10.0.0.5/30"), TEST_TIMESTAMP, 1);

      expect(record.network).toBe("10.0.0.5/30");
      expect(record.startIp).toBe("10.0.0.4");
      expect(record.endIp).toBe("10.0.0.7");
    });

    test("should handle single-host networks", () => {
      const record = enrichBlock(index, blockRow("192.0.2.17/32"), TEST_TIMESTAMP, 1);

      expect(record.startIp).toBe("192.0.2.17");
      expect(record.endIp).toBe("192.0.2.17");
      expect(record.from).toBe(record.to);
    });

    test("should reject malformed networks with the row number", () => {
      const enrich = () =>
        enrichBlock(index, blockRow("not-a-cidr", "100"), TEST_TIMESTAMP, 7);

      expect(enrich).toThrow(MalformedNetworkError);
      expect(enrich).toThrow('Invalid IPv4 network "not-a-cidr" in blocks row 7');
    });

    test("should reject a missing network column", () => {
      expect(() => enrichBlock(index, {}, TEST_TIMESTAMP, 1)).toThrow(
        'Invalid IPv4 network "" in blocks row 1'
      );
    });
  });

  describe("enrichBlocks", () => {
    const rows = [
      blockRow("198.51.100.0/24", "100", "200"),
      blockRow("203.0.113.128/25", "", "200"),
      blockRow("10.0.0.5/30", "999", "", "300"),
      blockRow("192.0.2.17/32"),
    ];

    test("should keep row count and order", () => {
      const records = enrichBlocks(index, rows, TEST_TIMESTAMP);

      expect(records).toHaveLength(rows.length);
      expect(records.map((r) => r.network)).toEqual(rows.map((r) => r.network));
      expect(records.map((r) => r.code)).toEqual(["AA", "BB", "CC", ""]);
    });

    test("should stamp every row with the same timestamp", () => {
      const records = enrichBlocks(index, rows, "31.12.2023 23:59:59");

      expect(
        records.every((r) => r.lastChanged === "31.12.2023 23:59:59")
      ).toBe(true);
    });

    test("should abort on the first malformed network", () => {
      const withBadRow = [rows[0], blockRow("not-a-cidr"), rows[1]];

      expect(() => enrichBlocks(index, withBadRow, TEST_TIMESTAMP)).toThrow(
        'Invalid IPv4 network "not-a-cidr" in blocks row 2'
      );
    });

    test("should report each record with its row number", () => {
      const seen: Array<[string, number]> = [];

      const records = enrichBlocks(index, rows, TEST_TIMESTAMP, {
        includeDecimal: false,
        onRecord: (record, rowNumber) => {
          seen.push([record.network, rowNumber]);
        },
      });

      expect(seen).toEqual([
        ["198.51.100.0/24", 1],
        ["203.0.113.128/25", 2],
        ["10.0.0.5/30", 3],
        ["192.0.2.17/32", 4],
      ]);
      expect(records[0].from).toBeUndefined();
    });

    test("should not report rows after a malformed network", () => {
      const onRecord = jest.fn();

      expect(() =>
        enrichBlocks(index, [rows[0], blockRow("not-a-cidr"), rows[1]], TEST_TIMESTAMP, {
          onRecord,
        })
      ).toThrow(MalformedNetworkError);
      expect(onRecord).toHaveBeenCalledTimes(1);
    });

    test("should return an empty list for no rows", () => {
      expect(enrichBlocks(index, [], TEST_TIMESTAMP)).toEqual([]);
    });

    test("should handle a large block table in one pass", () => {
      const many = Array.from({ length: 50000 }, (_, i) =>
        blockRow(
          `10.${(i >> 8) & 255}.${i & 255}.0/24`,
          i % 2 === 0 ? "100" : "",
          "200"
        )
      );

      const records = enrichBlocks(index, many, TEST_TIMESTAMP);

      expect(records).toHaveLength(50000);
      expect(records[49999]).toMatchObject({
        startIp: "10.195.79.0",
        endIp: "10.195.79.255",
        code: "BB",
      });
    });
  });
});
