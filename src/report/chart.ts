import { Resvg } from "@resvg/resvg-js";
import { readRatings } from "../collector/rating.js";
import { FIELD_ALIASES, readText, truncate } from "../shared/fields.js";
import type { RankedEntry } from "../shared/record.js";

export const CHART_WIDTH = 1000;
export const CHART_MIN_HEIGHT = 600;
export const CHART_ROW_HEIGHT = 50;
export const CHART_X_MAX = 5.5;

const MARGIN = { top: 60, right: 30, bottom: 70, left: 190 };
const BAR_RATIO = 0.35;
const SERIES = [
  { key: "airbnb", label: "Airbnb", color: "#FF5A5F" },
  { key: "booking", label: "Booking", color: "#003580" }
] as const;

const FONT = "DejaVu Sans, Arial, Helvetica, sans-serif";

const escapeXml = (value: string) =>
  value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");

const num = (value: number) => Number(value.toFixed(2)).toString();

export const chartLabel = (name: string) => (Array.from(name).length > 20 ? truncate(name, 17) : name);

export const chartHeight = (count: number) => Math.max(CHART_MIN_HEIGHT, count * CHART_ROW_HEIGHT);

/**
 * Grouped horizontal bars, one row per entry in the given order (rank 1 on
 * top). Missing or non-numeric ratings draw as empty bars without a label.
 */
export const buildRatingsChartSvg = (entries: RankedEntry[], title: string): string => {
  const height = chartHeight(entries.length);
  const plotWidth = CHART_WIDTH - MARGIN.left - MARGIN.right;
  const plotHeight = height - MARGIN.top - MARGIN.bottom;
  const rowHeight = plotHeight / Math.max(entries.length, 1);
  const barHeight = rowHeight * BAR_RATIO;
  const xFor = (value: number) => MARGIN.left + (Math.min(Math.max(value, 0), CHART_X_MAX) / CHART_X_MAX) * plotWidth;
  const plotBottom = MARGIN.top + plotHeight;

  const parts: string[] = [];
  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${CHART_WIDTH}" height="${height}" viewBox="0 0 ${CHART_WIDTH} ${height}" font-family="${FONT}">`
  );
  parts.push(`<rect x="0" y="0" width="${CHART_WIDTH}" height="${height}" fill="#ffffff"/>`);
  parts.push(
    `<text class="title" x="${CHART_WIDTH / 2}" y="35" font-size="20" text-anchor="middle">${escapeXml(title)}</text>`
  );

  for (let tick = 0; tick <= Math.floor(CHART_X_MAX); tick += 1) {
    const x = num(xFor(tick));
    parts.push(
      `<line class="grid" x1="${x}" y1="${MARGIN.top}" x2="${x}" y2="${num(plotBottom)}" stroke="#b0b0b0" stroke-opacity="0.3"/>`
    );
    parts.push(
      `<text class="tick" x="${x}" y="${num(plotBottom + 20)}" font-size="12" text-anchor="middle">${tick}</text>`
    );
  }

  entries.forEach((entry, index) => {
    const ratings = readRatings(entry.record);
    const centre = MARGIN.top + rowHeight * (index + 0.5);
    const name = chartLabel(readText(entry.record, FIELD_ALIASES.name, "Unknown"));
    parts.push(
      `<text class="name" x="${MARGIN.left - 10}" y="${num(centre)}" font-size="13" text-anchor="end" dominant-baseline="middle">${escapeXml(name)}</text>`
    );

    SERIES.forEach((series, offset) => {
      const value = ratings[series.key] ?? 0;
      const y = centre - barHeight + offset * barHeight;
      const width = xFor(value) - MARGIN.left;
      parts.push(
        `<rect class="bar ${series.key}" data-rank="${entry.rank}" x="${MARGIN.left}" y="${num(y)}" width="${num(width)}" height="${num(barHeight)}" fill="${series.color}"/>`
      );
      if (value > 0) {
        parts.push(
          `<text class="value" x="${num(xFor(value + 0.05))}" y="${num(y + barHeight / 2)}" font-size="11" dominant-baseline="middle">${value.toFixed(1)}</text>`
        );
      }
    });
  });

  parts.push(
    `<rect class="frame" x="${MARGIN.left}" y="${MARGIN.top}" width="${plotWidth}" height="${num(plotHeight)}" fill="none" stroke="#333333"/>`
  );
  parts.push(
    `<text class="axis-label" x="${MARGIN.left + plotWidth / 2}" y="${height - 20}" font-size="14" text-anchor="middle">Rating</text>`
  );

  const legendX = MARGIN.left + plotWidth - 120;
  const legendY = plotBottom - 60;
  parts.push(
    `<rect class="legend" x="${legendX}" y="${num(legendY)}" width="110" height="50" fill="#ffffff" fill-opacity="0.8" stroke="#cccccc"/>`
  );
  SERIES.forEach((series, index) => {
    const y = legendY + 10 + index * 20;
    parts.push(`<rect x="${legendX + 10}" y="${num(y)}" width="14" height="12" fill="${series.color}"/>`);
    parts.push(
      `<text x="${legendX + 32}" y="${num(y + 6)}" font-size="12" dominant-baseline="middle">${series.label}</text>`
    );
  });

  parts.push("</svg>");
  return parts.join("\n");
};

/** PNG bytes. A fresh renderer per call; nothing is shared between renders. */
export const renderRatingsChart = (entries: RankedEntry[], title: string): Buffer => {
  const svg = buildRatingsChartSvg(entries, title);
  const resvg = new Resvg(svg, {
    background: "#ffffff",
    font: { loadSystemFonts: true, defaultFontFamily: "DejaVu Sans" }
  });
  return resvg.render().asPng();
};
