import path from "path";
import { config as defaultConfig, MergeConfig } from "../config/env";
import {
  BlockRow,
  EnrichedBlockRecord,
  LocationRow,
  MergeOptions,
  MergeSummary,
} from "../models/geo-data";
import { enrichBlocks } from "./block-enricher-service";
import {
  outputColumns,
  readCsvRows,
  toOutputRows,
  writeCsvRows,
} from "./csv-service";
import { buildLocationIndex } from "./location-index-service";

export interface MergeResult {
  records: EnrichedBlockRecord[];
  summary: Omit<MergeSummary, "outputFile">;
}

/**
 * Joins a locations table and a blocks table into the merged country CSV
 */
export class GeoMergeService {
  constructor(private readonly config: MergeConfig = defaultConfig) {}

  /**
   * Merge in memory. Throws on the first malformed geoname_id or network.
   */
  public mergeRows(
    locationRows: LocationRow[],
    blockRows: BlockRow[],
    timestamp: string,
    includeDecimal: boolean = this.config.includeDecimal
  ): MergeResult {
    const index = buildLocationIndex(locationRows);
    console.log(`Loaded ${index.size} locations`);

    let resolved = 0;
    const records = enrichBlocks(index, blockRows, timestamp, {
      includeDecimal,
      onRecord: (record, rowNumber) => {
        if (record.code || record.name) resolved++;

        if (rowNumber % this.config.progressInterval === 0) {
          console.log(`Processed ${rowNumber} blocks...`);
        }
      },
    });

    console.log(
      `Block processing complete: ${records.length} blocks, ${resolved} resolved, ${
        records.length - resolved
      } without country`
    );

    return {
      records,
      summary: {
        locations: index.size,
        blocks: records.length,
        resolved,
        unresolved: records.length - resolved,
      },
    };
  }

  /**
   * Read both input files, merge them and write the output file.
   * Nothing is written if either input is malformed.
   */
  public async merge(options: MergeOptions): Promise<MergeSummary> {
    const locationsFile = path.resolve(process.cwd(), options.locationsFile);
    const blocksFile = path.resolve(process.cwd(), options.blocksFile);
    const outputFile = path.resolve(process.cwd(), options.outputFile);
    const includeDecimal =
      options.includeDecimal ?? this.config.includeDecimal;

    console.log(`Processing locations file: ${locationsFile}`);
    const locationRows = await readCsvRows<LocationRow>(locationsFile);

    console.log(`Processing blocks file: ${blocksFile}`);
    const blockRows = await readCsvRows<BlockRow>(blocksFile);

    const { records, summary } = this.mergeRows(
      locationRows,
      blockRows,
      options.timestamp,
      includeDecimal
    );

    await writeCsvRows(
      outputFile,
      outputColumns(includeDecimal),
      toOutputRows(records, includeDecimal)
    );
    console.log(`Wrote ${records.length} rows to ${outputFile}`);

    return { ...summary, outputFile };
  }
}

// Export a singleton instance
export const geoMergeService = new GeoMergeService();
