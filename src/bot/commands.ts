import type { PropertyService } from "../collector/service.js";
import { rankProperties } from "../collector/rating.js";
import { renderRatingsChart } from "../report/chart.js";
import { formatComplaint, formatProperty, formatPropertyBasic, formatRankedProperty } from "../report/format.js";
import { FIELD_ALIASES, readText } from "../shared/fields.js";
import { isEmptyRecord, type RankedEntry } from "../shared/record.js";
import type { InlineKeyboard } from "./telegram.js";

export type Reply =
  | { kind: "text"; text: string }
  | { kind: "photo"; image: Buffer; caption: string }
  | { kind: "menu"; text: string; keyboard: InlineKeyboard };

export type PropertySource = Pick<
  PropertyService,
  "listRatedProperties" | "listProperties" | "getProperty" | "listComplaints" | "complaintsEnabled"
>;

export type ChartRenderer = (entries: RankedEntry[], title: string) => Buffer;

export type CommandDeps = {
  properties: PropertySource;
  renderChart?: ChartRenderer;
};

export type ResolvedCommand = {
  run: () => Promise<Reply[]>;
  // Whether the command hits the data source, so a "typing" action is worth sending.
  fetches: boolean;
};

export const MAIN_MENU: InlineKeyboard = [
  [
    { text: "🏆 Top 5", callback_data: "action_top5" },
    { text: "📈 Top 20", callback_data: "action_top20" }
  ],
  [
    { text: "📊 All Ratings", callback_data: "action_ratings" },
    { text: "🏠 Properties", callback_data: "action_properties" }
  ],
  [
    { text: "🔍 Property Details", callback_data: "action_property_help" },
    { text: "📋 Complaints", callback_data: "action_complaints_help" }
  ]
];

export const WELCOME_TEXT =
  "👋 Welcome to the Property Management Bot!\n\n" +
  "I can help you with:\n" +
  "• View property ratings (Airbnb & Booking)\n" +
  "• Browse the list of properties\n" +
  "• Check complaints for any property\n\n" +
  "Use the menu below or type commands directly:";

const text = (value: string): Reply => ({ kind: "text", text: value });

export class BotCommands {
  private readonly renderChart: ChartRenderer;

  constructor(private readonly deps: CommandDeps) {
    this.renderChart = deps.renderChart ?? renderRatingsChart;
  }

  async start(): Promise<Reply[]> {
    return [{ kind: "menu", text: WELCOME_TEXT, keyboard: MAIN_MENU }];
  }

  async menu(): Promise<Reply[]> {
    return [{ kind: "menu", text: "📌 Main Menu\n\nChoose an option below:", keyboard: MAIN_MENU }];
  }

  async ratings(): Promise<Reply[]> {
    const records = await this.deps.properties.listRatedProperties();
    if (records.length === 0) {
      return [text("No property data available (check DATA_URL or network).")];
    }
    const lines = ["🏡 Property Ratings\n", ...records.map(formatProperty)];
    return [text(lines.join("\n"))];
  }

  /** Ranked summary plus chart. The heading counts what was ranked, not the limit asked for. */
  async top(limit: number): Promise<Reply[]> {
    const records = await this.deps.properties.listRatedProperties();
    if (records.length === 0) {
      return [text("No property data available.")];
    }
    const ranked = rankProperties(records, limit);
    if (ranked.length === 0) {
      return [text("Could not calculate ratings.")];
    }
    const count = ranked.length;
    const lines = [`🏆 Top ${count} Best Rated Properties\n`, ...ranked.map(formatRankedProperty)];
    return [
      text(lines.join("\n")),
      {
        kind: "photo",
        image: this.renderChart(ranked, `Top ${count} Properties - Ratings Comparison`),
        caption: `📊 Top ${count} Properties Rating Chart`
      }
    ];
  }

  async properties(options: { complaintsHint: boolean }): Promise<Reply[]> {
    const records = await this.deps.properties.listProperties();
    if (records.length === 0) {
      return [text("No properties available.")];
    }
    const lines = ["🏠 Properties List\n", ...records.map(formatPropertyBasic), "\n💡 Use /property <id> for details"];
    if (options.complaintsHint) {
      lines.push("💡 Use /complaints <id> to see complaints");
    }
    return [text(lines.join("\n"))];
  }

  async property(args: string[]): Promise<Reply[]> {
    const [id] = args;
    if (!id) {
      return [text("Usage: /property <id>\nExample: /property 1")];
    }
    const record = await this.deps.properties.getProperty(id);
    if (!record || isEmptyRecord(record)) {
      return [text(`Property with id ${id} not found.`)];
    }
    return [text(formatProperty(record))];
  }

  async complaints(args: string[]): Promise<Reply[]> {
    const [id] = args;
    if (!id) {
      return [
        text(
          "Usage: /complaints <property_id>\n" +
            "Example: /complaints 1\n\n" +
            "This will show all complaints for the specified property."
        )
      ];
    }
    if (!this.deps.properties.complaintsEnabled) {
      return [text("Complaints feature is not configured.\nPlease set COMPLAINTS_URL in environment variables.")];
    }

    const record = await this.deps.properties.getProperty(id);
    if (!record || isEmptyRecord(record)) {
      return [text(`Property with id ${id} not found.`)];
    }

    const complaints = await this.deps.properties.listComplaints(id);
    const name = readText(record, FIELD_ALIASES.name, `Property ${id}`);
    if (complaints.length === 0) {
      return [text(`No complaints found for ${name} (id: ${id}).`)];
    }

    const lines = [`📋 Complaints for ${name} (id: ${id})\n`, `Total: ${complaints.length} complaint(s)\n`];
    for (const complaint of complaints) {
      lines.push(formatComplaint(complaint), "");
    }
    return [text(lines.join("\n"))];
  }

  async propertyHelp(): Promise<Reply[]> {
    return [
      text("🔍 Property Details\n\nTo view details for a specific property, use:\n/property <id>\n\nExample: /property 1")
    ];
  }

  async complaintsHelp(): Promise<Reply[]> {
    return [
      text(
        "📋 View Complaints\n\nTo see complaints for a specific property, use:\n/complaints <property_id>\n\nExample: /complaints 1"
      )
    ];
  }

  resolveCommand(name: string, args: string[]): ResolvedCommand | null {
    switch (name) {
      case "start":
        return { run: () => this.start(), fetches: false };
      case "menu":
        return { run: () => this.menu(), fetches: false };
      case "ratings":
        return { run: () => this.ratings(), fetches: true };
      case "top5":
        return { run: () => this.top(5), fetches: true };
      case "top20":
        return { run: () => this.top(20), fetches: true };
      case "properties":
        return { run: () => this.properties({ complaintsHint: true }), fetches: true };
      case "property":
        return { run: () => this.property(args), fetches: args.length > 0 };
      case "complaints":
        return { run: () => this.complaints(args), fetches: args.length > 0 };
      default:
        return null;
    }
  }

  resolveAction(action: string): ResolvedCommand | null {
    switch (action) {
      case "action_top5":
        return { run: () => this.top(5), fetches: true };
      case "action_top20":
        return { run: () => this.top(20), fetches: true };
      case "action_ratings":
        return { run: () => this.ratings(), fetches: true };
      case "action_properties":
        return { run: () => this.properties({ complaintsHint: false }), fetches: true };
      case "action_property_help":
        return { run: () => this.propertyHelp(), fetches: false };
      case "action_complaints_help":
        return { run: () => this.complaintsHelp(), fetches: false };
      default:
        return null;
    }
  }
}
