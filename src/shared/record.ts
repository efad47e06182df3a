/**
 * One property or complaint as served by the data source. There is no fixed
 * schema; canonical fields are read through the alias lists in fields.ts.
 */
export type DataRecord = Record<string, unknown>;

export type RatingPair = {
  airbnb: number | null;
  booking: number | null;
};

export type RankedEntry = {
  record: DataRecord;
  score: number;
  rank: number; // 1-based
};

/** The data source answers `{}` for ids it does not know. */
export const isEmptyRecord = (record: DataRecord) => Object.keys(record).length === 0;

export const isDataRecord = (value: unknown): value is DataRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);
