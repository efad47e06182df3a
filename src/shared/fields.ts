import type { DataRecord } from "./record.js";

export const FIELD_ALIASES = {
  id: ["id"],
  name: ["name"],
  location: ["location", "address"],
  url: ["url"],
  airbnbRating: ["airbnb_rating", "airbnb"],
  bookingRating: ["booking_rating", "booking"],
  complaintTitle: ["title", "subject"],
  complaintDescription: ["description", "message", "text"],
  complaintStatus: ["status"],
  complaintSeverity: ["severity", "priority"],
  complaintDate: ["date", "created_at", "createdAt"]
} as const satisfies Record<string, readonly string[]>;

/** First alias whose value is neither undefined nor null. */
export const resolveField = (record: DataRecord, aliases: readonly string[]): unknown => {
  for (const key of aliases) {
    const value = record[key];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
};

const toStringOrNull = (value: unknown): string | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return value;
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
};

export const readText = (record: DataRecord, aliases: readonly string[], fallback: string): string =>
  toStringOrNull(resolveField(record, aliases)) ?? fallback;

/**
 * Finite numbers pass through, numeric strings are parsed, everything else
 * (booleans, blanks, NaN, objects) counts as no rating.
 */
export const toRating = (value: unknown): number | null => {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

/** Counts and cuts by code points. */
export const truncate = (text: string, max: number, marker = "..."): string => {
  const chars = Array.from(text);
  return chars.length > max ? `${chars.slice(0, max).join("")}${marker}` : text;
};
