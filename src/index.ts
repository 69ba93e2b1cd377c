export * from "./models/geo-data";
export { IpUtil } from "./services/ip-util";
export {
  buildLocationIndex,
  parseGeonameId,
} from "./services/location-index-service";
export {
  enrichBlock,
  enrichBlocks,
  resolveCountry,
  toBlockRecord,
} from "./services/block-enricher-service";
export {
  outputColumns,
  readCsvRows,
  toOutputRows,
  writeCsvRows,
} from "./services/csv-service";
export {
  GeoMergeService,
  geoMergeService,
  MergeResult,
} from "./services/geo-merge-service";
export * from "./services/merge-errors";
export {
  formatTimestamp,
  isValidTimestamp,
  normalizeTimestamp,
} from "./services/timestamp-util";
export { loadConfig, MergeConfig } from "./config/env";
