/**
 * Raw row from a locations CSV (e.g. GeoLite2-Country-Locations-en.csv)
 */
export interface LocationRow {
  geoname_id?: string;
  country_iso_code?: string;
  country_name?: string;
  [column: string]: string | undefined;
}

/**
 * Raw row from a blocks CSV (e.g. GeoLite2-Country-Blocks-IPv4.csv)
 */
export interface BlockRow {
  network?: string;
  geoname_id?: string;
  registered_country_geoname_id?: string;
  represented_country_geoname_id?: string;
  [column: string]: string | undefined;
}

/**
 * Country data for a single location identifier
 */
export interface LocationEntry {
  geonameId: number;
  countryCode: string;
  countryName: string;
}

export type LocationIndex = ReadonlyMap<number, LocationEntry>;

/**
 * Block row with its location references parsed
 */
export interface BlockRecord {
  network: string;
  primaryLocationId?: number;
  registeredCountryLocationId?: number;
  representedCountryLocationId?: number;
}

export interface CountryMatch {
  code: string;
  name: string;
}

export interface Ipv4Range {
  start: string;
  end: string;
  startLong: number;
  endLong: number;
}

/**
 * One row of the merged output
 */
export interface EnrichedBlockRecord extends CountryMatch {
  lastChanged: string;
  network: string;
  startIp: string;
  endIp: string;
  from?: number;
  to?: number;
}

export interface EnrichOptions {
  includeDecimal?: boolean;
}

export interface EnrichBatchOptions extends EnrichOptions {
  // Called after each row is enriched, with its 1-based row number
  onRecord?: (record: EnrichedBlockRecord, rowNumber: number) => void;
}

export interface MergeOptions extends EnrichOptions {
  locationsFile: string;
  blocksFile: string;
  outputFile: string;
  timestamp: string;
}

export interface MergeSummary {
  locations: number;
  blocks: number;
  resolved: number;
  unresolved: number;
  outputFile: string;
}

export const OUTPUT_COLUMNS = [
  "_last_changed",
  "network",
  "start_ip",
  "end_ip",
  "from",
  "to",
  "code",
  "name",
] as const;

export type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

export type OutputRow = Partial<Record<OutputColumn, string | number>>;
