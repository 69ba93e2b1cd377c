import fs from "fs";
import csv from "csv-parser";
import * as fastCsv from "fast-csv";
import {
  EnrichedBlockRecord,
  OUTPUT_COLUMNS,
  OutputColumn,
  OutputRow,
} from "../models/geo-data";

type CsvRow = Record<string, string | undefined>;

/**
 * Read a whole CSV file into memory, keyed by header.
 * Leading whitespace in cells is dropped and a UTF-8 BOM on the first header
 * is ignored.
 */
export const readCsvRows = async <T extends CsvRow = CsvRow>(
  filePath: string
): Promise<T[]> => {
  return new Promise((resolve, reject) => {
    const rows: T[] = [];

    fs.createReadStream(filePath)
      .on("error", (err) => {
        reject(err);
      })
      .pipe(
        csv({
          mapHeaders: ({ header }) => header.replace(/^\uFEFF/, "").trim(),
          mapValues: ({ value }) =>
            typeof value === "string" ? value.trimStart() : value,
        })
      )
      .on("data", (row) => {
        rows.push(row);
      })
      .on("end", () => {
        resolve(rows);
      })
      .on("error", (err) => {
        console.error(`Error reading CSV file ${filePath}: ${err.message}`);
        reject(err);
      });
  });
};

/**
 * Output columns for a run, with or without the decimal from/to pair
 */
export const outputColumns = (includeDecimal: boolean): OutputColumn[] =>
  OUTPUT_COLUMNS.filter(
    (column) => includeDecimal || (column !== "from" && column !== "to")
  );

/**
 * Map enriched records to output rows keyed by column name
 */
export const toOutputRows = (
  records: EnrichedBlockRecord[],
  includeDecimal: boolean
): OutputRow[] =>
  records.map((record) => {
    const row: OutputRow = {
      _last_changed: record.lastChanged,
      network: record.network,
      start_ip: record.startIp,
      end_ip: record.endIp,
      code: record.code,
      name: record.name,
    };

    if (includeDecimal) {
      row.from = record.from ?? "";
      row.to = record.to ?? "";
    }

    return row;
  });

/**
 * Write rows to a CSV file with a header line, in the given column order
 */
export const writeCsvRows = async (
  filePath: string,
  columns: readonly string[],
  rows: OutputRow[]
): Promise<void> => {
  return new Promise((resolve, reject) => {
    fastCsv
      .writeToPath(filePath, rows, {
        headers: [...columns],
        includeEndRowDelimiter: true,
      })
      .on("finish", () => {
        resolve();
      })
      .on("error", (err: Error) => {
        console.error(`Error writing CSV file ${filePath}: ${err.message}`);
        reject(err);
      });
  });
};
