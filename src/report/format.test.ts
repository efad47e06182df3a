import { describe, expect, it } from "vitest";
import { formatComplaint, formatProperty, formatPropertyBasic, formatRankedProperty, rankMarker } from "./format.js";

describe("formatProperty", () => {
  it("renders ratings and optional extras", () => {
    const text = formatProperty({
      id: "1",
      name: "Sea View",
      airbnb_rating: 4.5,
      booking: "4.8",
      location: "Lisbon",
      url: "https://example.local/p/1"
    });
    expect(text).toBe(
      "🏠 Sea View (id: 1)\n   ⭐ Airbnb: 4.5\n   ⭐ Booking: 4.8\n    Location: Lisbon\n    URL: https://example.local/p/1\n"
    );
  });

  it("falls back to defaults for an empty record", () => {
    expect(formatProperty({})).toBe("🏠 Unnamed property (id: N/A)\n   ⭐ Airbnb: N/A\n   ⭐ Booking: N/A\n");
  });
});

describe("formatPropertyBasic", () => {
  it("uses address when location is missing", () => {
    expect(formatPropertyBasic({ id: 3, name: "Loft", address: "2 Dock Rd" })).toBe("🏠 [3] Loft - 2 Dock Rd");
  });

  it("omits the location part when absent", () => {
    expect(formatPropertyBasic({ id: 3 })).toBe("🏠 [3] Unnamed property");
  });
});

describe("formatRankedProperty", () => {
  it("uses medals for the podium and numbers after", () => {
    expect(rankMarker(1)).toBe("🥇");
    expect(rankMarker(3)).toBe("🥉");
    expect(rankMarker(4)).toBe("4.");
  });

  it("prints the score with two decimals", () => {
    const line = formatRankedProperty({ record: { id: "9", name: "Cabin", airbnb: 4, booking_rating: 4.5 }, score: 4.25, rank: 2 });
    expect(line).toBe("🥈 Cabin (id: 9)\n   ⭐ Avg: 4.25 | Airbnb: 4 | Booking: 4.5");
  });

  it("defaults missing fields", () => {
    expect(formatRankedProperty({ record: {}, score: 0, rank: 12 })).toBe(
      "12. Unnamed (id: N/A)\n   ⭐ Avg: 0.00 | Airbnb: N/A | Booking: N/A"
    );
  });
});

describe("formatComplaint", () => {
  it("includes optional severity and date from their aliases", () => {
    const text = formatComplaint({
      id: "c1",
      subject: "Noise",
      message: "Loud party next door",
      status: "open",
      priority: "high",
      createdAt: "2024-05-01"
    });
    expect(text).toBe(
      [
        "📋 Complaint #c1: Noise",
        "   Status: open",
        "   Severity: high",
        "   Date: 2024-05-01",
        "   Description: Loud party next door"
      ].join("\n")
    );
  });

  it("truncates long descriptions to 200 characters", () => {
    const description = "a".repeat(200) + "b".repeat(50);
    const lines = formatComplaint({ description }).split("\n");
    expect(lines[lines.length - 1]).toBe(`   Description: ${"a".repeat(200)}...`);
  });

  it("truncates by code points so emoji stay whole", () => {
    const description = "a" + "😀".repeat(250);
    const lines = formatComplaint({ description }).split("\n");
    expect(lines[lines.length - 1]).toBe(`   Description: a${"😀".repeat(199)}...`);
  });

  it("defaults every field", () => {
    expect(formatComplaint({})).toBe("📋 Complaint #N/A: No title\n   Status: unknown\n   Description: No description");
  });
});
