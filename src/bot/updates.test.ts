import { describe, expect, it } from "vitest";
import { parseCommand, parseUpdate } from "./updates.js";

describe("parseCommand", () => {
  it("reads the command name and arguments", () => {
    expect(parseCommand("/property 12")).toEqual({ name: "property", args: ["12"] });
    expect(parseCommand("  /Top5@PropBot  ")).toEqual({ name: "top5", args: [] });
  });

  it("ignores plain text", () => {
    expect(parseCommand("hello there")).toBeNull();
    expect(parseCommand("")).toBeNull();
  });
});

describe("parseUpdate", () => {
  it("keeps the fields the bot reads", () => {
    const update = parseUpdate({
      update_id: 10,
      message: { message_id: 1, chat: { id: 5, type: "private" }, text: "/menu", date: 0 }
    });
    expect(update).toEqual({ update_id: 10, message: { message_id: 1, chat: { id: 5 }, text: "/menu" } });
  });

  it("rejects bodies without an update id", () => {
    expect(parseUpdate({ message: {} })).toBeNull();
    expect(parseUpdate("nope")).toBeNull();
  });
});
