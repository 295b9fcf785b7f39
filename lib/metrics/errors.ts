/**
 * Query error taxonomy
 *
 * Resolution errors (InvalidFilter, UnknownFacility) abort a read. A
 * FacilityQueryFailed is recorded per facility in the result; only when every
 * facility fails does the read reject, with AllFacilitiesFailed.
 */

import { ERROR_MESSAGES } from "../../config";

export type AtlasQueryErrorCode =
  | "INVALID_FILTER"
  | "UNKNOWN_FACILITY"
  | "FACILITY_QUERY_FAILED"
  | "ALL_FACILITIES_FAILED"
  | "QUERY_CANCELLED"
  | "QUERY_TIMEOUT";

export abstract class AtlasQueryError extends Error {
  abstract readonly code: AtlasQueryErrorCode;
}

export class InvalidFilter extends AtlasQueryError {
  readonly code = "INVALID_FILTER";

  constructor(message: string) {
    super(message);
    this.name = "InvalidFilter";
  }
}

export class UnknownFacility extends AtlasQueryError {
  readonly code = "UNKNOWN_FACILITY";

  constructor(public readonly shortNames: string[]) {
    super(`${ERROR_MESSAGES.UNKNOWN_FACILITY}: ${shortNames.join(", ")}`);
    this.name = "UnknownFacility";
  }
}

export class FacilityQueryFailed extends AtlasQueryError {
  readonly code = "FACILITY_QUERY_FAILED";

  constructor(
    public readonly facilityShortName: string,
    public readonly cause: unknown,
  ) {
    super(
      `${ERROR_MESSAGES.FACILITY_QUERY_FAILED} ${facilityShortName}: ${describeError(cause)}`,
    );
    this.name = "FacilityQueryFailed";
  }
}

export class AllFacilitiesFailed extends AtlasQueryError {
  readonly code = "ALL_FACILITIES_FAILED";

  constructor(public readonly failures: FacilityQueryFailed[]) {
    super(
      `${ERROR_MESSAGES.ALL_FACILITIES_FAILED} (${failures
        .map((failure) => failure.facilityShortName)
        .join(", ")})`,
    );
    this.name = "AllFacilitiesFailed";
  }
}

export class QueryCancelled extends AtlasQueryError {
  readonly code = "QUERY_CANCELLED";

  constructor() {
    super(ERROR_MESSAGES.QUERY_CANCELLED);
    this.name = "QueryCancelled";
  }
}

export class QueryTimeout extends AtlasQueryError {
  readonly code = "QUERY_TIMEOUT";

  constructor(public readonly timeoutMs: number) {
    super(`${ERROR_MESSAGES.QUERY_TIMEOUT} after ${timeoutMs}ms`);
    this.name = "QueryTimeout";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
