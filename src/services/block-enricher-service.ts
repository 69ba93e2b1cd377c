import {
  BlockRecord,
  BlockRow,
  CountryMatch,
  EnrichBatchOptions,
  EnrichOptions,
  EnrichedBlockRecord,
  LocationIndex,
} from "../models/geo-data";
import { IpUtil } from "./ip-util";
import { parseGeonameId } from "./location-index-service";
import { MalformedNetworkError } from "./merge-errors";

/**
 * Parse the location references of a raw block row. Blank or non-numeric
 * cells become undefined.
 */
export const toBlockRecord = (row: BlockRow): BlockRecord => ({
  network: row.network ?? "",
  primaryLocationId: parseGeonameId(row.geoname_id) ?? undefined,
  registeredCountryLocationId:
    parseGeonameId(row.registered_country_geoname_id) ?? undefined,
  representedCountryLocationId:
    parseGeonameId(row.represented_country_geoname_id) ?? undefined,
});

/**
 * Resolve the country of a block: its own location first, then the
 * registered country, then the represented country. First hit wins.
 */
export const resolveCountry = (
  index: LocationIndex,
  block: BlockRecord
): CountryMatch => {
  const candidates = [
    block.primaryLocationId,
    block.registeredCountryLocationId,
    block.representedCountryLocationId,
  ];

  for (const candidate of candidates) {
    if (candidate === undefined) continue;

    const location = index.get(candidate);
    if (location) {
      return { code: location.countryCode, name: location.countryName };
    }
  }

  return { code: "", name: "" };
};

/**
 * Enrich a single block row. rowNumber is only used for error reporting.
 */
export const enrichBlock = (
  index: LocationIndex,
  row: BlockRow,
  timestamp: string,
  rowNumber: number,
  options: EnrichOptions = {}
): EnrichedBlockRecord => {
  const block = toBlockRecord(row);
  const range = IpUtil.parseIpv4Cidr(block.network.trim());
  if (!range) {
    throw new MalformedNetworkError(row.network, rowNumber);
  }

  const { code, name } = resolveCountry(index, block);
  const record: EnrichedBlockRecord = {
    lastChanged: timestamp,
    network: block.network,
    startIp: range.start,
    endIp: range.end,
    code,
    name,
  };

  if (options.includeDecimal ?? true) {
    record.from = range.startLong;
    record.to = range.endLong;
  }

  return record;
};

/**
 * Enrich every block row in order. Output has exactly one record per input
 * row; the first malformed network aborts the whole batch.
 */
export const enrichBlocks = (
  index: LocationIndex,
  rows: Iterable<BlockRow>,
  timestamp: string,
  options: EnrichBatchOptions = {}
): EnrichedBlockRecord[] => {
  const { onRecord, ...rowOptions } = options;
  const records: EnrichedBlockRecord[] = [];
  let rowNumber = 0;

  for (const row of rows) {
    rowNumber++;
    const record = enrichBlock(index, row, timestamp, rowNumber, rowOptions);
    records.push(record);
    onRecord?.(record, rowNumber);
  }

  return records;
};
