import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { AppContext, createContext } from "../../src/context.js";
import { silentLogger } from "../../src/logger.js";
import { TOOLS } from "../../src/tools/definitions.js";
import { ToolResult, handleToolCall } from "../../src/tools/handlers.js";
import { FIXED_NOW, TempNotes, frontmatter, makeConfig, tempNotes } from "../helpers.js";

function textOf(result: ToolResult): string {
  return result.content.map((part) => part.text).join("\n");
}

describe("handleToolCall", () => {
  let notes: TempNotes;
  let context: AppContext;
  let jane: string;
  let bob: string;

  beforeEach(() => {
    notes = tempNotes();
    jane = notes.write(
      "jane.md",
      frontmatter([
        "title: Jane Doe",
        "tags: [person]",
        'CONTACT_BIRTHDAY: "1985-03-15"',
        'CONTACT_EMAILS: ["home: jane@example.com"]',
      ])
    );
    bob = notes.write("bob.md", frontmatter(["title: Bob Stone", "tags: [person]", 'CONTACT_BIRTHDAY: "not a date"']));
    context = createContext(makeConfig({ notesDirectory: notes.dir }), {
      logger: silentLogger,
      now: () => FIXED_NOW,
    });
  });

  afterEach(() => {
    notes.cleanup();
  });

  it("declares every tool it handles", () => {
    expect(TOOLS.map((tool) => tool.name)).toEqual([
      "list_managed_properties",
      "insert_birthday_reminders",
      "insert_reminder",
      "schedule_all_reminders",
      "list_contacts",
      "search_contacts",
      "get_contact",
    ]);
  });

  it("lists managed properties", () => {
    expect(textOf(handleToolCall(context, "list_managed_properties", {}))).toBe(
      "CONTACT_BIRTHDAY\nCONTACT_EMAILS\nCONTACT_ADDRESSES\nCONTACT_PHONES"
    );
  });

  it("inserts birthday reminders once", () => {
    const first = handleToolCall(context, "insert_birthday_reminders", { contact: "jane" });
    expect(first.isError).toBeUndefined();
    expect(textOf(first)).toBe(
      `${jane}\nAdded reminders:\n- Jane Doe's birthday in 7 days\n- Jane Doe's birthday`
    );

    const second = handleToolCall(context, "insert_birthday_reminders", { contact: "Jane Doe" });
    expect(textOf(second)).toBe(`${jane}\nBirthday reminders already present.`);
  });

  it("reports invalid arguments as errors", () => {
    const result = handleToolCall(context, "insert_birthday_reminders", { advanceNoticeDays: -1 });

    expect(result.isError).toBe(true);
    expect(textOf(result).startsWith("Error: ")).toBe(true);
  });

  it("inserts a reminder", () => {
    const result = handleToolCall(context, "insert_reminder", {
      contact: "jane",
      text: "Call Jane",
      date: "2022-04-02",
    });
    expect(textOf(result)).toBe(`Added "Call Jane" under Reminders in ${jane}`);
  });

  it("reports command failures as errors", () => {
    const result = handleToolCall(context, "insert_reminder", { contact: "jane", text: "Call", date: "soon" });

    expect(result).toEqual({
      content: [{ type: "text", text: 'Error: "soon" is not a date (expected YYYY-MM-DD [HH:MM])' }],
      isError: true,
    });
  });

  it("summarizes a batch run", () => {
    const result = handleToolCall(context, "schedule_all_reminders", {});

    expect(result.isError).toBe(false);
    expect(textOf(result)).toBe(
      [
        "Checked 2 documents, 1 failed.",
        `FAILED ${bob}: Invalid CONTACT_BIRTHDAY in ${bob}: "not a date" is not a date`,
        `Added Jane Doe's birthday in 7 days (${jane})`,
        `Added Jane Doe's birthday (${jane})`,
      ].join("\n")
    );
  });

  it("flags a batch run where every document failed", () => {
    notes.write("jane.md", frontmatter(["tags: [person]", 'CONTACT_BIRTHDAY: "1985-03-15"']));
    const result = handleToolCall(context, "schedule_all_reminders", undefined);

    expect(result.isError).toBe(true);
    expect(textOf(result).split("\n")[0]).toBe("Checked 2 documents, 2 failed.");
  });

  it("lists contacts", () => {
    expect(textOf(handleToolCall(context, "list_contacts", {}))).toBe(
      "Contacts (2):\n- Bob Stone\n- Jane Doe (born 1985-03-15)"
    );
  });

  it("says so when there are no contacts", () => {
    const empty = createContext(makeConfig({ notesDirectory: notes.dir, contactTag: "nobody" }), {
      logger: silentLogger,
    });
    expect(textOf(handleToolCall(empty, "list_contacts", {}))).toBe("No contacts found.");
  });

  it("searches contacts", () => {
    expect(textOf(handleToolCall(context, "search_contacts", { query: "jane" }))).toBe(
      [
        "Name: Jane Doe",
        `File: ${jane}`,
        "Birthday: 1985-03-15",
        "Emails: jane@example.com (home)",
        "Phones: none",
        "Addresses: none",
      ].join("\n")
    );
    expect(textOf(handleToolCall(context, "search_contacts", { query: "zzz" }))).toBe('No contacts match "zzz".');
  });

  it("shows one contact", () => {
    expect(textOf(handleToolCall(context, "get_contact", { contact: "Bob Stone" }))).toBe(
      [
        "Name: Bob Stone",
        `File: ${bob}`,
        "Birthday: unknown",
        "Emails: none",
        "Phones: none",
        "Addresses: none",
      ].join("\n")
    );
  });

  it("rejects unknown tools", () => {
    expect(handleToolCall(context, "delete_everything", {})).toEqual({
      content: [{ type: "text", text: "Unknown tool: delete_everything" }],
      isError: true,
    });
  });
});
