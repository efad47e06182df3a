import { FIELD_ALIASES, resolveField, toRating } from "../shared/fields.js";
import type { DataRecord, RankedEntry, RatingPair } from "../shared/record.js";

export const readRatings = (record: DataRecord): RatingPair => ({
  airbnb: toRating(resolveField(record, FIELD_ALIASES.airbnbRating)),
  booking: toRating(resolveField(record, FIELD_ALIASES.bookingRating))
});

/**
 * Mean of the ratings that are present, or 0 when there are none.
 *
 * The 0 is a sentinel for "no rating data" and shares the channel with a
 * genuinely reported 0; unrated properties therefore rank alongside
 * zero-rated ones, at the bottom.
 */
export const scoreProperty = (record: DataRecord): number => {
  const { airbnb, booking } = readRatings(record);
  const present = [airbnb, booking].filter((value): value is number => value !== null);
  if (present.length === 0) return 0;
  return present.reduce((sum, value) => sum + value, 0) / present.length;
};

/**
 * Highest score first. The sort is stable, so ties keep their input order.
 * The result holds `min(limit, records.length)` entries.
 */
export const rankProperties = (records: DataRecord[], limit: number): RankedEntry[] => {
  const count = Math.max(0, Math.trunc(limit));
  return records
    .map((record) => ({ record, score: scoreProperty(record) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, count)
    .map((entry, index) => ({ ...entry, rank: index + 1 }));
};
