import { FIELD_ALIASES, readText, truncate } from "../shared/fields.js";
import type { DataRecord, RankedEntry } from "../shared/record.js";

export const DESCRIPTION_MAX_LENGTH = 200;

const MEDALS: Record<number, string> = { 1: "🥇", 2: "🥈", 3: "🥉" };

export const rankMarker = (rank: number) => MEDALS[rank] ?? `${rank}.`;

export const formatProperty = (record: DataRecord): string => {
  const name = readText(record, FIELD_ALIASES.name, "Unnamed property");
  const id = readText(record, FIELD_ALIASES.id, "N/A");
  const airbnb = readText(record, FIELD_ALIASES.airbnbRating, "N/A");
  const booking = readText(record, FIELD_ALIASES.bookingRating, "N/A");
  const location = readText(record, FIELD_ALIASES.location, "");
  const url = readText(record, FIELD_ALIASES.url, "");

  const extra: string[] = [];
  if (location) extra.push(`Location: ${location}`);
  if (url) extra.push(`URL: ${url}`);
  const extras = extra.map((line) => `\n    ${line}`).join("");

  return `🏠 ${name} (id: ${id})\n   ⭐ Airbnb: ${airbnb}\n   ⭐ Booking: ${booking}${extras}\n`;
};

export const formatPropertyBasic = (record: DataRecord): string => {
  const name = readText(record, FIELD_ALIASES.name, "Unnamed property");
  const id = readText(record, FIELD_ALIASES.id, "N/A");
  const location = readText(record, FIELD_ALIASES.location, "");
  return `🏠 [${id}] ${name}${location ? ` - ${location}` : ""}`;
};

export const formatRankedProperty = ({ record, score, rank }: RankedEntry): string => {
  const name = readText(record, FIELD_ALIASES.name, "Unnamed");
  const id = readText(record, FIELD_ALIASES.id, "N/A");
  const airbnb = readText(record, FIELD_ALIASES.airbnbRating, "N/A");
  const booking = readText(record, FIELD_ALIASES.bookingRating, "N/A");
  return `${rankMarker(rank)} ${name} (id: ${id})\n   ⭐ Avg: ${score.toFixed(2)} | Airbnb: ${airbnb} | Booking: ${booking}`;
};

export const formatComplaint = (record: DataRecord): string => {
  const id = readText(record, FIELD_ALIASES.id, "N/A");
  const title = readText(record, FIELD_ALIASES.complaintTitle, "No title");
  const description = readText(record, FIELD_ALIASES.complaintDescription, "No description");
  const status = readText(record, FIELD_ALIASES.complaintStatus, "unknown");
  const severity = readText(record, FIELD_ALIASES.complaintSeverity, "");
  const date = readText(record, FIELD_ALIASES.complaintDate, "");

  const lines = [`📋 Complaint #${id}: ${title}`, `   Status: ${status}`];
  if (severity) lines.push(`   Severity: ${severity}`);
  if (date) lines.push(`   Date: ${date}`);
  lines.push(`   Description: ${truncate(description, DESCRIPTION_MAX_LENGTH)}`);
  return lines.join("\n");
};
