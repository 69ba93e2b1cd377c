import { LocationEntry, LocationIndex, LocationRow } from "../models/geo-data";
import { MalformedIdentifierError } from "./merge-errors";

const IDENTIFIER_PATTERN = /^\d+$/;

/**
 * Parse a location identifier cell, returning null when it is blank or not a
 * non-negative integer
 */
export const parseGeonameId = (value: string | undefined): number | null => {
  const trimmed = value?.trim() ?? "";
  if (!IDENTIFIER_PATTERN.test(trimmed)) return null;

  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? id : null;
};

/**
 * Build the geoname_id -> country lookup from the rows of a locations file.
 *
 * A repeated geoname_id replaces the earlier entry. Any row without a
 * numeric geoname_id aborts the build.
 */
export const buildLocationIndex = (
  rows: Iterable<LocationRow>
): LocationIndex => {
  const index = new Map<number, LocationEntry>();
  let rowNumber = 0;

  for (const row of rows) {
    rowNumber++;

    const geonameId = parseGeonameId(row.geoname_id);
    if (geonameId === null) {
      throw new MalformedIdentifierError(row.geoname_id, rowNumber);
    }

    index.set(geonameId, {
      geonameId,
      countryCode: row.country_iso_code ?? "",
      countryName: row.country_name ?? "",
    });
  }

  return index;
};
