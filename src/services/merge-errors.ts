export type GeoMergeErrorCode =
  | "MALFORMED_IDENTIFIER"
  | "MALFORMED_NETWORK"
  | "INVALID_TIMESTAMP";

/**
 * Base class for errors that abort a merge run
 */
export class GeoMergeError extends Error {
  constructor(public readonly code: GeoMergeErrorCode, message: string) {
    super(message);
    this.name = "GeoMergeError";
  }
}

/**
 * A location row whose geoname_id is not an integer
 */
export class MalformedIdentifierError extends GeoMergeError {
  constructor(public readonly value: string | undefined, public readonly row: number) {
    super(
      "MALFORMED_IDENTIFIER",
      `Invalid geoname_id ${JSON.stringify(value ?? "")} in locations row ${row}`
    );
    this.name = "MalformedIdentifierError";
  }
}

/**
 * A block row whose network is not an IPv4 CIDR
 */
export class MalformedNetworkError extends GeoMergeError {
  constructor(public readonly value: string | undefined, public readonly row: number) {
    super(
      "MALFORMED_NETWORK",
      `Invalid IPv4 network ${JSON.stringify(value ?? "")} in blocks row ${row}`
    );
    this.name = "MalformedNetworkError";
  }
}

export class InvalidTimestampError extends GeoMergeError {
  constructor(public readonly value: string) {
    super(
      "INVALID_TIMESTAMP",
      `Invalid timestamp ${JSON.stringify(value)}, expected DD.MM.YYYY HH:MM:SS`
    );
    this.name = "InvalidTimestampError";
  }
}
